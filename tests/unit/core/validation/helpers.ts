/**
 * Shared fixtures for check tests.
 */
import { createPythonParser, parsePython } from '../../../../src/validators/tree-sitter/python-ast.js';
import { getDefaultValidationTables } from '../../../../src/core/validation/tables.js';
import { createStaticResolver } from '../../../../src/core/validation/resolvers.js';
import type { CheckInput } from '../../../../src/core/validation/types.js';

const parser = createPythonParser();

export function makeInput(code: string, overrides: Partial<CheckInput> = {}): CheckInput {
  return {
    code,
    parsed: parsePython(parser, code),
    tables: getDefaultValidationTables(),
    resolveModule: createStaticResolver(['pytest', 'os', 'json', 'unittest']),
    ...overrides,
  };
}
