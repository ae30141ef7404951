/**
 * Node-to-parent lookup built in one pre-pass over a syntax tree.
 *
 * tree-sitter hands out a fresh wrapper object on every child access, so
 * nodes are keyed by their numeric id rather than by object identity.
 */
import type Parser from 'tree-sitter';
import { walkTree } from '../../validators/tree-sitter/TreeSitterUtils.js';
import { PyDefinitionNodes } from '../../validators/tree-sitter/python-ast.js';

export type ParentMap = ReadonlyMap<number, Parser.SyntaxNode>;

export function buildParentMap(root: Parser.SyntaxNode): ParentMap {
  const parents = new Map<number, Parser.SyntaxNode>();
  walkTree(root, (node) => {
    for (const child of node.children) {
      parents.set(child.id, node);
    }
  });
  return parents;
}

/**
 * Wrappers tree-sitter places between a definition and the construct that
 * owns it.
 */
const TRANSPARENT_WRAPPERS: ReadonlySet<string> = new Set([
  PyDefinitionNodes.BLOCK,
  PyDefinitionNodes.DECORATED_DEFINITION,
]);

/**
 * The nearest enclosing construct of a node: its parent once block and
 * decorator wrappers are skipped. Null for the root.
 */
export function enclosingConstruct(
  node: Parser.SyntaxNode,
  parents: ParentMap
): Parser.SyntaxNode | null {
  let current = parents.get(node.id) ?? null;
  while (current && TRANSPARENT_WRAPPERS.has(current.type)) {
    current = parents.get(current.id) ?? null;
  }
  return current;
}

export function isClassMember(node: Parser.SyntaxNode, parents: ParentMap): boolean {
  return enclosingConstruct(node, parents)?.type === PyDefinitionNodes.CLASS_DEFINITION;
}
