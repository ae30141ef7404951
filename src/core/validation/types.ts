/**
 * Validation type definitions: findings, verdicts, the check contract and
 * the tables checks read their names and patterns from.
 */
import type { ParsedPython } from '../../validators/tree-sitter/python-ast.js';
import type { CallableSignature } from '../extraction/types.js';

export type Severity = 'warning' | 'error';

export type CheckId =
  | 'syntax'
  | 'forbidden-constructs'
  | 'structure'
  | 'naming'
  | 'assertions'
  | 'mocking'
  | 'dependencies';

export interface ValidationFinding {
  /** Check that emitted the finding */
  check: CheckId;
  severity: Severity;
  message: string;
  /** 1-based line, when the finding points at one */
  line?: number;
}

export interface ValidationVerdict {
  /** True iff no finding has severity 'error' */
  isValid: boolean;
  /** Findings in the order the checks ran */
  findings: ValidationFinding[];
}

/**
 * Answers whether a module name can be imported in the target environment.
 * Treated as an opaque, possibly slow, synchronous oracle.
 */
export type ModuleResolver = (moduleName: string) => boolean;

export interface DangerousCall {
  call: string;
  severity: Severity;
  label: string;
}

export interface ForbiddenPattern {
  pattern: RegExp;
  severity: Severity;
  message: string;
}

/**
 * Compiled name and pattern tables. Built from configuration by
 * toValidationTables().
 */
export interface ValidationTables {
  testPrefix: string;
  includeMethods: boolean;
  frameworks: string[];
  dangerousCalls: DangerousCall[];
  riskyImports: string[];
  forbiddenPatterns: ForbiddenPattern[];
  assertionPatterns: RegExp[];
  callableTypes: string[];
  mockPatterns: RegExp[];
}

/**
 * Everything a check may look at. The candidate is parsed once per
 * validation and shared read-only by all checks.
 */
export interface CheckInput {
  code: string;
  parsed: ParsedPython;
  context?: CallableSignature;
  tables: ValidationTables;
  resolveModule: ModuleResolver;
}

export interface ValidationCheck {
  id: CheckId;
  name: string;
  run(input: CheckInput): ValidationFinding[];
}
