/**
 * Forbidden-construct check. Two independent techniques: a tree walk for
 * dangerous calls and risky imports, and a textual regex scan. Both always
 * run and may report the same construct twice.
 */
import { findNodesOfType, getLocation } from '../../../validators/tree-sitter/TreeSitterUtils.js';
import {
  PyStatementNodes,
  collectImports,
  getCalleeName,
} from '../../../validators/tree-sitter/python-ast.js';
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

// ---------------------------------------------------------------------------
// Tree-based
// ---------------------------------------------------------------------------

function checkCalls({ parsed, tables }: CheckInput): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const byCallee = new Map(tables.dangerousCalls.map((entry) => [entry.call, entry]));

  for (const call of findNodesOfType(parsed.root, [PyStatementNodes.CALL])) {
    const callee = getCalleeName(call, parsed.sourceCode);
    const entry = callee ? byCallee.get(callee) : undefined;
    if (!entry) continue;

    const { line } = getLocation(call);
    findings.push({
      check: 'forbidden-constructs',
      severity: entry.severity,
      message: `${entry.label}: ${entry.call} (line ${line})`,
      line,
    });
  }

  return findings;
}

function checkImports({ parsed, tables }: CheckInput): ValidationFinding[] {
  const risky = new Set(tables.riskyImports);

  return collectImports(parsed.root, parsed.sourceCode)
    .filter((ref) => !ref.isFromImport && risky.has(ref.moduleName))
    .map((ref) => ({
      check: 'forbidden-constructs' as const,
      severity: 'warning' as const,
      message: `Potentially risky import: ${ref.moduleName} (line ${ref.line})`,
      line: ref.line,
    }));
}

// ---------------------------------------------------------------------------
// Textual
// ---------------------------------------------------------------------------

function checkPatterns({ code, tables }: CheckInput): ValidationFinding[] {
  return tables.forbiddenPatterns
    .filter((entry) => entry.pattern.test(code))
    .map((entry) => ({
      check: 'forbidden-constructs' as const,
      severity: entry.severity,
      message: entry.message,
    }));
}

export const forbiddenConstructsCheck: ValidationCheck = {
  id: 'forbidden-constructs',
  name: 'Forbidden Constructs Check',
  run(input: CheckInput): ValidationFinding[] {
    const findings: ValidationFinding[] = [];
    if (input.parsed.isWellFormed) {
      findings.push(...checkCalls(input), ...checkImports(input));
    }
    findings.push(...checkPatterns(input));
    return findings;
  },
};
