/**
 * Tests for the naming check.
 */
import { describe, it, expect } from 'vitest';
import { namingCheck } from '../../../../../src/core/validation/checks/naming.js';
import { getDefaultValidationTables } from '../../../../../src/core/validation/tables.js';
import { makeInput } from '../helpers.js';

const MISSING = {
  check: 'naming',
  severity: 'error',
  message: "No test functions found (missing 'test_' prefix)",
};

describe('namingCheck', () => {
  it('should pass with a module-level test function', () => {
    expect(namingCheck.run(makeInput('def test_x():\n    assert True\n'))).toEqual([]);
  });

  it('should count async and decorated test functions', () => {
    expect(namingCheck.run(makeInput('async def test_x():\n    assert True\n'))).toEqual([]);
    expect(namingCheck.run(makeInput(
      'import pytest\n\n@pytest.mark.slow\ndef test_x():\n    assert True\n'
    ))).toEqual([]);
  });

  it('should fail without a prefixed function', () => {
    expect(namingCheck.run(makeInput('def helper():\n    assert True\n'))).toEqual([MISSING]);
  });

  it('should ignore nested functions', () => {
    expect(namingCheck.run(makeInput(
      'def helper():\n    def test_inner():\n        assert True\n'
    ))).toEqual([MISSING]);
  });

  it('should ignore methods by default', () => {
    const code = 'class TestThing:\n    def test_a(self):\n        assert True\n';

    expect(namingCheck.run(makeInput(code))).toEqual([MISSING]);
  });

  it('should count methods of module-level classes when enabled', () => {
    const code = 'class TestThing:\n    def test_a(self):\n        assert True\n';
    const tables = { ...getDefaultValidationTables(), includeMethods: true };

    expect(namingCheck.run(makeInput(code, { tables }))).toEqual([]);
  });

  it('should use the configured prefix', () => {
    const tables = { ...getDefaultValidationTables(), testPrefix: 'check_' };

    expect(namingCheck.run(makeInput('def check_x():\n    assert True\n', { tables }))).toEqual([]);
    expect(namingCheck.run(makeInput('def test_x():\n    assert True\n', { tables }))).toEqual([
      { ...MISSING, message: "No test functions found (missing 'check_' prefix)" },
    ]);
  });

  it('should skip malformed code', () => {
    expect(namingCheck.run(makeInput('def helper(:\n    pass\n'))).toEqual([]);
  });
});
