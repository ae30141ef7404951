/**
 * Naming check: at least one test function must carry the test prefix.
 */
import type Parser from 'tree-sitter';
import { getNodeText } from '../../../validators/tree-sitter/TreeSitterUtils.js';
import {
  PyDefinitionNodes,
  directFunctionDefinitions,
  unwrapDecorated,
} from '../../../validators/tree-sitter/python-ast.js';
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

function candidateTestFunctions(root: Parser.SyntaxNode, includeMethods: boolean): Parser.SyntaxNode[] {
  const functions = directFunctionDefinitions(root);
  if (!includeMethods) return functions;

  for (const child of root.namedChildren.map(unwrapDecorated)) {
    if (child.type !== PyDefinitionNodes.CLASS_DEFINITION) continue;
    const body = child.childForFieldName('body');
    if (body) functions.push(...directFunctionDefinitions(body));
  }
  return functions;
}

export const namingCheck: ValidationCheck = {
  id: 'naming',
  name: 'Naming Check',
  run({ parsed, tables }: CheckInput): ValidationFinding[] {
    if (!parsed.isWellFormed) return [];

    const hasTest = candidateTestFunctions(parsed.root, tables.includeMethods).some((fn) => {
      const nameNode = fn.childForFieldName('name');
      return nameNode !== null && getNodeText(nameNode, parsed.sourceCode).startsWith(tables.testPrefix);
    });
    if (hasTest) return [];

    return [{
      check: 'naming',
      severity: 'error',
      message: `No test functions found (missing '${tables.testPrefix}' prefix)`,
    }];
  },
};
