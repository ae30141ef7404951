/**
 * Tests for the dependency check.
 */
import { describe, it, expect, vi } from 'vitest';
import { dependenciesCheck } from '../../../../../src/core/validation/checks/dependencies.js';
import { makeInput } from '../helpers.js';

describe('dependenciesCheck', () => {
  it('should pass when every import resolves', () => {
    expect(dependenciesCheck.run(makeInput('import pytest\nimport os.path\nfrom json import dumps\n'))).toEqual([]);
  });

  it('should pass code without imports', () => {
    expect(dependenciesCheck.run(makeInput('def test_x():\n    assert True\n'))).toEqual([]);
  });

  it('should stop at the first missing module', () => {
    const resolveModule = vi.fn((name: string) => name === 'pytest');

    const findings = dependenciesCheck.run(makeInput(
      'import pytest\nimport missing_pkg\nimport other_missing\n',
      { resolveModule }
    ));

    expect(findings).toEqual([
      { check: 'dependencies', severity: 'error', message: 'Missing dependency: missing_pkg', line: 2 },
    ]);
    expect(resolveModule).toHaveBeenCalledTimes(2);
  });

  it('should resolve dotted and aliased names in order', () => {
    const resolveModule = vi.fn((_name: string) => true);

    dependenciesCheck.run(makeInput('import a.b, c as d\nfrom e.f import g\n', { resolveModule }));

    expect(resolveModule.mock.calls.map(([name]) => name)).toEqual(['a.b', 'c', 'e.f']);
  });

  it('should skip relative and __future__ imports', () => {
    const resolveModule = vi.fn(() => false);

    const findings = dependenciesCheck.run(makeInput(
      'from __future__ import annotations\nfrom . import sibling\nfrom .pkg import thing\n',
      { resolveModule }
    ));

    expect(findings).toEqual([]);
    expect(resolveModule).not.toHaveBeenCalled();
  });

  it('should report a resolver failure', () => {
    const resolveModule = vi.fn((): boolean => {
      throw new Error('interpreter timed out');
    });

    expect(dependenciesCheck.run(makeInput('import pytest\n', { resolveModule }))).toEqual([
      {
        check: 'dependencies',
        severity: 'error',
        message: 'Dependency check failed: interpreter timed out',
        line: 1,
      },
    ]);
  });

  it('should report unparseable imports', () => {
    const input = makeInput('import pytest\ndef test_x(:\n    pass\n');
    const [first] = input.parsed.syntaxErrors;

    expect(dependenciesCheck.run(input)).toEqual([
      {
        check: 'dependencies',
        severity: 'error',
        message: `Dependency check failed: imports could not be parsed (syntax error at line ${first.line})`,
        line: first.line,
      },
    ]);
  });
});
