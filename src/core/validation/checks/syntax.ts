/**
 * Syntax check: the candidate must parse as Python.
 */
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

export const syntaxCheck: ValidationCheck = {
  id: 'syntax',
  name: 'Syntax Check',
  run({ parsed }: CheckInput): ValidationFinding[] {
    const [first] = parsed.syntaxErrors;
    if (!first) return [];

    return [{
      check: 'syntax',
      severity: 'error',
      message: `Syntax error at line ${first.line}: ${first.message}`,
      line: first.line,
    }];
  },
};
