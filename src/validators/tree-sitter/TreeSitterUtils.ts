/**
 * Shared tree-sitter helpers: traversal, text extraction, positions and
 * syntax-error discovery.
 */

import Parser from 'tree-sitter';

/**
 * 1-based source position.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * A syntax problem found in a parsed tree.
 */
export interface SyntaxDiagnostic extends SourceLocation {
  /** Short human-readable description, e.g. "missing ':'" */
  message: string;
}

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
}

/**
 * Creates a tree-sitter parsing context.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  return {
    tree: parser.parse(sourceCode),
    sourceCode,
  };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Finds all descendant nodes matching the given types, in pre-order.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode[] {
  const results: Parser.SyntaxNode[] = [];
  const typeSet = new Set(types);

  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });

  return results;
}

/**
 * Walks the AST depth-first (pre-order), calling the callback for each node.
 * Returning `false` from the callback skips that node's children.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Gets the start and end line numbers of a node (1-based, inclusive).
 */
export function getNodeLines(node: Parser.SyntaxNode): {
  startLine: number;
  endLine: number;
} {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

/**
 * Tree-sitter inserts zero-width nodes for tokens the grammar expected but
 * did not find. The root of an empty file is the only other zero-width node.
 */
export function isMissingNode(node: Parser.SyntaxNode): boolean {
  return node.parent !== null && node.startIndex === node.endIndex;
}

/**
 * Collects ERROR and missing nodes in document order. Children of an ERROR
 * node are not reported separately.
 */
export function findSyntaxErrors(
  root: Parser.SyntaxNode,
  sourceCode: string
): SyntaxDiagnostic[] {
  const diagnostics: SyntaxDiagnostic[] = [];

  walkTree(root, (node) => {
    if (node.type === 'ERROR') {
      diagnostics.push({ ...getLocation(node), message: describeErrorNode(node, sourceCode) });
      return false;
    }
    if (isMissingNode(node)) {
      diagnostics.push({ ...getLocation(node), message: `missing '${node.type}'` });
    }
    return true;
  });

  return diagnostics;
}

const SNIPPET_LIMIT = 30;

function describeErrorNode(node: Parser.SyntaxNode, sourceCode: string): string {
  const firstLine = getNodeText(node, sourceCode).split('\n')[0].trim();
  if (firstLine.length === 0) {
    return 'invalid syntax';
  }
  const snippet = firstLine.length > SNIPPET_LIMIT
    ? `${firstLine.slice(0, SNIPPET_LIMIT)}...`
    : firstLine;
  return `invalid syntax near '${snippet}'`;
}
