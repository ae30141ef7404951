/**
 * Tests for the forbidden-construct check.
 */
import { describe, it, expect } from 'vitest';
import { forbiddenConstructsCheck } from '../../../../../src/core/validation/checks/forbidden-constructs.js';
import { getDefaultValidationTables } from '../../../../../src/core/validation/tables.js';
import { makeInput } from '../helpers.js';

function run(code: string) {
  return forbiddenConstructsCheck.run(makeInput(code));
}

describe('forbiddenConstructsCheck', () => {
  it('should report nothing for plain test code', () => {
    expect(run('import pytest\n\ndef test_x():\n    assert 1 == 1\n')).toEqual([]);
  });

  it('should report eval from both the tree and the text', () => {
    expect(run("def test_x():\n    eval('1+1')\n")).toEqual([
      {
        check: 'forbidden-constructs',
        severity: 'error',
        message: 'Dangerous function call: eval (line 2)',
        line: 2,
      },
      {
        check: 'forbidden-constructs',
        severity: 'error',
        message: 'Dangerous system call detected',
      },
    ]);
  });

  it('should report shell calls and risky imports', () => {
    const findings = run("import os\n\ndef test_x():\n    os.system('ls')\n");

    expect(findings.map((f) => f.message)).toEqual([
      'Shell command execution: os.system (line 4)',
      'Potentially risky import: os (line 1)',
      'Dangerous system call detected',
    ]);
    expect(findings.map((f) => f.severity)).toEqual(['error', 'warning', 'error']);
  });

  it('should report each import name of a multi-name import', () => {
    const findings = run('import sys, json, subprocess\n');

    expect(findings.map((f) => f.message)).toEqual([
      'Potentially risky import: sys (line 1)',
      'Potentially risky import: subprocess (line 1)',
    ]);
  });

  it('should not treat from-imports as risky imports', () => {
    expect(run('from os import path\n')).toEqual([]);
  });

  it('should report file operations as warnings', () => {
    const findings = run("def test_x():\n    with open('data.txt') as fh:\n        assert fh\n");

    expect(findings).toEqual([
      {
        check: 'forbidden-constructs',
        severity: 'warning',
        message: 'File operation: open (line 2)',
        line: 2,
      },
      {
        check: 'forbidden-constructs',
        severity: 'warning',
        message: 'Potential file operation detected',
      },
    ]);
  });

  it('should report each occurrence of a dangerous call', () => {
    const findings = run("exec('a')\nexec('b')\n");

    expect(findings.map((f) => f.message)).toEqual([
      'Dangerous function call: exec (line 1)',
      'Dangerous function call: exec (line 2)',
      'Dangerous system call detected',
    ]);
  });

  it('should not flag a method that shares a dangerous name', () => {
    const findings = run("def test_x(runner):\n    runner.eval_all()\n");

    expect(findings).toEqual([]);
  });

  it('should skip the tree walk for malformed code but keep the text scan', () => {
    const findings = run("def test_x(:\n    eval('1')\n");

    expect(findings).toEqual([
      {
        check: 'forbidden-constructs',
        severity: 'error',
        message: 'Dangerous system call detected',
      },
    ]);
  });

  it('should use configured call tables', () => {
    const tables = {
      ...getDefaultValidationTables(),
      dangerousCalls: [{ call: 'pickle.loads', severity: 'error' as const, label: 'Unsafe deserialization' }],
      forbiddenPatterns: [],
    };

    const findings = forbiddenConstructsCheck.run(makeInput('pickle.loads(blob)\n', { tables }));

    expect(findings.map((f) => f.message)).toEqual(['Unsafe deserialization: pickle.loads (line 1)']);
  });
});
