/**
 * Tree-sitter Python parsing exports.
 */
export * from './TreeSitterUtils.js';
export * from './python-ast.js';
