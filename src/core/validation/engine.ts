/**
 * Validation engine: parses a candidate once, runs every check in order and
 * folds the findings into a verdict.
 */
import type Parser from 'tree-sitter';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { createPythonParser, parsePython } from '../../validators/tree-sitter/python-ast.js';
import type { CallableSignature } from '../extraction/types.js';
import {
  syntaxCheck,
  forbiddenConstructsCheck,
  structureCheck,
  namingCheck,
  assertionsCheck,
  mockingCheck,
  dependenciesCheck,
} from './checks/index.js';
import { createDefaultResolver } from './resolvers.js';
import { getDefaultValidationTables } from './tables.js';
import type {
  CheckInput,
  ModuleResolver,
  ValidationCheck,
  ValidationFinding,
  ValidationTables,
  ValidationVerdict,
} from './types.js';

// ---------------------------------------------------------------------------
// All registered checks, in run order
// ---------------------------------------------------------------------------

export const ALL_CHECKS: readonly ValidationCheck[] = [
  syntaxCheck,
  forbiddenConstructsCheck,
  structureCheck,
  namingCheck,
  assertionsCheck,
  mockingCheck,
  dependenciesCheck,
];

export interface CodeValidatorOptions {
  tables?: ValidationTables;
  /** Defaults to the standard library plus pytest */
  resolveModule?: ModuleResolver;
  /** Reuse a parser across validators */
  parser?: Parser;
  /** Replace the battery, e.g. to run a subset */
  checks?: readonly ValidationCheck[];
}

export class CodeValidator {
  private readonly tables: ValidationTables;
  private readonly resolveModule: ModuleResolver;
  private readonly parser: Parser;
  private readonly checks: readonly ValidationCheck[];
  private readonly log: Logger;

  constructor(options: CodeValidatorOptions = {}) {
    this.tables = options.tables ?? getDefaultValidationTables();
    this.resolveModule = options.resolveModule ?? createDefaultResolver(['pytest']);
    this.parser = options.parser ?? createPythonParser();
    this.checks = options.checks ?? ALL_CHECKS;
    this.log = rootLogger.child('validator');
  }

  /**
   * Validates a candidate test snippet. Never throws for bad content; a
   * check that throws becomes an error finding.
   *
   * @param context - Signature of the function under test, when known
   */
  validate(candidate: string, context?: CallableSignature): ValidationVerdict {
    const input: CheckInput = {
      code: candidate,
      parsed: parsePython(this.parser, candidate),
      context,
      tables: this.tables,
      resolveModule: this.resolveModule,
    };

    const findings: ValidationFinding[] = [];
    for (const check of this.checks) {
      const checkFindings = this.runCheck(check, input);
      for (const finding of checkFindings) {
        this.log.debug(`${check.id}: ${finding.severity}: ${finding.message}`);
      }
      findings.push(...checkFindings);
    }

    return {
      isValid: !findings.some((finding) => finding.severity === 'error'),
      findings,
    };
  }

  private runCheck(check: ValidationCheck, input: CheckInput): ValidationFinding[] {
    try {
      return check.run(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug(`${check.id} threw`, { message });
      return [{ check: check.id, severity: 'error', message: `${check.name} failed: ${message}` }];
    }
  }
}

/**
 * One-shot form of `new CodeValidator(options).validate(...)`.
 */
export function validateCandidate(
  candidate: string,
  context?: CallableSignature,
  options: CodeValidatorOptions = {}
): ValidationVerdict {
  return new CodeValidator(options).validate(candidate, context);
}
