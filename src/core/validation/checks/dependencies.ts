/**
 * Dependency check: every absolute import must resolve. Stops at the first
 * module the resolver rejects.
 */
import { collectImports } from '../../../validators/tree-sitter/python-ast.js';
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

export const dependenciesCheck: ValidationCheck = {
  id: 'dependencies',
  name: 'Dependencies Check',
  run({ parsed, resolveModule }: CheckInput): ValidationFinding[] {
    const [syntaxError] = parsed.syntaxErrors;
    if (syntaxError) {
      return [{
        check: 'dependencies',
        severity: 'error',
        message: `Dependency check failed: imports could not be parsed (syntax error at line ${syntaxError.line})`,
        line: syntaxError.line,
      }];
    }

    for (const ref of collectImports(parsed.root, parsed.sourceCode)) {
      if (ref.isRelative) continue;

      let resolved: boolean;
      try {
        resolved = resolveModule(ref.moduleName);
      } catch (error) {
        return [{
          check: 'dependencies',
          severity: 'error',
          message: `Dependency check failed: ${error instanceof Error ? error.message : String(error)}`,
          line: ref.line,
        }];
      }

      if (!resolved) {
        return [{
          check: 'dependencies',
          severity: 'error',
          message: `Missing dependency: ${ref.moduleName}`,
          line: ref.line,
        }];
      }
    }

    return [];
  },
};
