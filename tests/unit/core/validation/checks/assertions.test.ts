/**
 * Tests for the assertions check.
 */
import { describe, it, expect } from 'vitest';
import { assertionsCheck } from '../../../../../src/core/validation/checks/assertions.js';
import { getDefaultValidationTables } from '../../../../../src/core/validation/tables.js';
import { makeInput } from '../helpers.js';

describe('assertionsCheck', () => {
  it('should pass with an assert statement', () => {
    expect(assertionsCheck.run(makeInput('def test_x():\n    assert 1 == 1\n'))).toEqual([]);
  });

  it('should fail without any assertion', () => {
    expect(assertionsCheck.run(makeInput('def test_x():\n    pass\n'))).toEqual([
      { check: 'assertions', severity: 'error', message: 'No valid assertions found in test code' },
    ]);
  });

  it('should match configured patterns', () => {
    const tables = { ...getDefaultValidationTables(), assertionPatterns: [/self\.assert\w+\(/] };

    expect(assertionsCheck.run(makeInput('self.assertEqual(a, b)\n', { tables }))).toEqual([]);
    expect(assertionsCheck.run(makeInput('assert a == b\n', { tables }))).toHaveLength(1);
  });
});
