/**
 * Assertion check: a test without an assertion verifies nothing.
 */
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

export const assertionsCheck: ValidationCheck = {
  id: 'assertions',
  name: 'Assertions Check',
  run({ code, tables }: CheckInput): ValidationFinding[] {
    if (tables.assertionPatterns.some((pattern) => pattern.test(code))) return [];

    return [{
      check: 'assertions',
      severity: 'error',
      message: 'No valid assertions found in test code',
    }];
  },
};
