/**
 * Structure check: the candidate should mention a testing framework.
 */
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

export const structureCheck: ValidationCheck = {
  id: 'structure',
  name: 'Structure Check',
  run({ code, tables }: CheckInput): ValidationFinding[] {
    if (tables.frameworks.some((name) => code.includes(name))) return [];

    return [{
      check: 'structure',
      severity: 'warning',
      message: `No recognized testing framework referenced (expected one of: ${tables.frameworks.join(', ')})`,
    }];
  },
};
