/**
 * Python parsing on top of tree-sitter: parser creation, syntax diagnostics
 * and the small structural queries shared by the extractor and the
 * validator checks.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import {
  createContext,
  findNodesOfType,
  findSyntaxErrors,
  getLocation,
  getNodeText,
  walkTree,
  type SyntaxDiagnostic,
} from './TreeSitterUtils.js';

// =============================================================================
// Tree-sitter Node Type Constants
// =============================================================================

/** Python tree-sitter node types for imports */
export const PyImportNodes = {
  IMPORT_STATEMENT: 'import_statement',
  IMPORT_FROM_STATEMENT: 'import_from_statement',
  ALIASED_IMPORT: 'aliased_import',
  DOTTED_NAME: 'dotted_name',
  RELATIVE_IMPORT: 'relative_import',
} as const;

/** Python tree-sitter node types for definitions */
export const PyDefinitionNodes = {
  MODULE: 'module',
  BLOCK: 'block',
  CLASS_DEFINITION: 'class_definition',
  FUNCTION_DEFINITION: 'function_definition',
  DECORATED_DEFINITION: 'decorated_definition',
  ASYNC: 'async',
} as const;

/** Python tree-sitter node types for parameters */
export const PyParameterNodes = {
  IDENTIFIER: 'identifier',
  TYPED_PARAMETER: 'typed_parameter',
  DEFAULT_PARAMETER: 'default_parameter',
  TYPED_DEFAULT_PARAMETER: 'typed_default_parameter',
  LIST_SPLAT_PATTERN: 'list_splat_pattern',
  DICTIONARY_SPLAT_PATTERN: 'dictionary_splat_pattern',
  KEYWORD_SEPARATOR: 'keyword_separator',
  POSITIONAL_SEPARATOR: 'positional_separator',
  TUPLE_PATTERN: 'tuple_pattern',
  PARAMETERS: 'parameters',
  LAMBDA_PARAMETERS: 'lambda_parameters',
} as const;

/** Python tree-sitter node types for statements and expressions */
export const PyStatementNodes = {
  EXPRESSION_STATEMENT: 'expression_statement',
  CALL: 'call',
  STRING: 'string',
  STRING_START: 'string_start',
  STRING_END: 'string_end',
  COMMENT: 'comment',
  KEYWORD_ARGUMENT: 'keyword_argument',
  DICTIONARY_SPLAT: 'dictionary_splat',
  LINE_CONTINUATION: 'line_continuation',
  ERROR: 'ERROR',
  // Python 2 forms the grammar still accepts
  PRINT_STATEMENT: 'print_statement',
  EXEC_STATEMENT: 'exec_statement',
} as const;

/**
 * Creates a Python parser instance.
 *
 * Note: The type assertion `as unknown as Parser.Language` is required because
 * tree-sitter-python's TypeScript definitions don't extend tree-sitter's
 * Language type, despite being compatible at runtime.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

/**
 * A Python source parsed into a fresh tree, with its syntax problems.
 */
export interface ParsedPython {
  root: Parser.SyntaxNode;
  sourceCode: string;
  /** Tree errors and Python 3 violations, sorted by position */
  syntaxErrors: SyntaxDiagnostic[];
  /** True when the source is valid Python 3 as far as the parse can tell */
  isWellFormed: boolean;
}

/**
 * Parses Python source. Never throws for malformed input; problems are
 * reported in `syntaxErrors`.
 */
export function parsePython(parser: Parser, sourceCode: string): ParsedPython {
  const ctx = createContext(parser, sourceCode);
  const root = ctx.tree.rootNode;
  const syntaxErrors = [
    ...findSyntaxErrors(root, sourceCode),
    ...findPython3Violations(root, sourceCode),
  ].sort((a, b) => a.line - b.line || a.column - b.column);
  return {
    root,
    sourceCode,
    syntaxErrors,
    isWellFormed: syntaxErrors.length === 0,
  };
}

/**
 * Finds code that tree-sitter-python parses without an ERROR node but that
 * a Python 3 compiler rejects: Python 2 print and exec statements, misordered
 * parameters and statements indented differently from their siblings.
 */
export function findPython3Violations(
  root: Parser.SyntaxNode,
  sourceCode: string
): SyntaxDiagnostic[] {
  const diagnostics: SyntaxDiagnostic[] = [];

  walkTree(root, (node) => {
    switch (node.type) {
      case PyStatementNodes.ERROR:
        return false;
      case PyStatementNodes.PRINT_STATEMENT:
        diagnostics.push(diagnosticAt(node, "Missing parentheses in call to 'print'"));
        break;
      case PyStatementNodes.EXEC_STATEMENT:
        diagnostics.push(diagnosticAt(node, "Missing parentheses in call to 'exec'"));
        break;
      case PyParameterNodes.PARAMETERS:
      case PyParameterNodes.LAMBDA_PARAMETERS:
        diagnostics.push(...checkParameterOrder(node));
        break;
      case PyDefinitionNodes.MODULE:
      case PyDefinitionNodes.BLOCK:
        diagnostics.push(...checkIndentation(node, sourceCode));
        break;
      default:
        break;
    }
    return true;
  });

  return diagnostics;
}

function diagnosticAt(node: Parser.SyntaxNode, message: string): SyntaxDiagnostic {
  return { ...getLocation(node), message };
}

/**
 * Plain parameters, then defaulted ones, until `*` or `*args`. A bare `*`
 * needs a named parameter after it and nothing may follow `**kwargs`.
 */
function checkParameterOrder(params: Parser.SyntaxNode): SyntaxDiagnostic[] {
  let seenDefault = false;
  let afterStar = false;
  let bareStar: Parser.SyntaxNode | null = null;
  let namedAfterBareStar = false;
  let seenKwargs = false;

  for (const param of params.namedChildren) {
    if (param.type === PyStatementNodes.COMMENT) continue;
    if (seenKwargs) {
      return [diagnosticAt(param, 'arguments cannot follow var-keyword argument')];
    }

    // `name: T`, `*args: T` and `**kwargs: T` carry their target first
    const target = param.type === PyParameterNodes.TYPED_PARAMETER
      ? param.firstNamedChild ?? param
      : param;

    switch (target.type) {
      case PyParameterNodes.POSITIONAL_SEPARATOR:
        break;
      case PyParameterNodes.LIST_SPLAT_PATTERN:
        afterStar = true;
        break;
      case PyParameterNodes.KEYWORD_SEPARATOR:
        afterStar = true;
        bareStar = param;
        break;
      case PyParameterNodes.DICTIONARY_SPLAT_PATTERN:
        seenKwargs = true;
        break;
      case PyParameterNodes.TUPLE_PATTERN:
        return [diagnosticAt(param, 'tuple parameter unpacking is not supported')];
      case PyParameterNodes.DEFAULT_PARAMETER:
      case PyParameterNodes.TYPED_DEFAULT_PARAMETER:
        seenDefault = true;
        if (bareStar) namedAfterBareStar = true;
        break;
      default:
        if (seenDefault && !afterStar) {
          return [diagnosticAt(param, 'parameter without a default follows parameter with a default')];
        }
        if (bareStar) namedAfterBareStar = true;
        break;
    }
  }

  if (bareStar && !namedAfterBareStar) {
    return [diagnosticAt(bareStar, 'named arguments must follow bare *')];
  }
  return [];
}

/**
 * Every statement that starts its own line must share the indentation of
 * the first such statement in its block. Module statements start at column 1.
 */
function checkIndentation(container: Parser.SyntaxNode, sourceCode: string): SyntaxDiagnostic[] {
  let expected = container.type === PyDefinitionNodes.MODULE ? '' : null;

  for (const statement of container.namedChildren) {
    if (
      statement.type === PyStatementNodes.COMMENT ||
      statement.type === PyStatementNodes.LINE_CONTINUATION ||
      statement.type === PyStatementNodes.ERROR
    ) {
      continue;
    }
    const indent = leadingIndent(statement, sourceCode);
    if (indent === null) continue;
    if (expected === null) {
      expected = indent;
    } else if (indent !== expected) {
      return [diagnosticAt(
        statement,
        indent.length < expected.length
          ? 'unindent does not match any outer indentation level'
          : 'unexpected indent'
      )];
    }
  }

  return [];
}

/**
 * The whitespace before a node on its line, or null when something else
 * precedes it (`a = 1; b = 2`, `if x: pass`).
 */
function leadingIndent(node: Parser.SyntaxNode, sourceCode: string): string | null {
  const lineStart = sourceCode.lastIndexOf('\n', node.startIndex - 1) + 1;
  const prefix = sourceCode.slice(lineStart, node.startIndex);
  return /^[ \t]*$/.test(prefix) ? prefix : null;
}

/**
 * Renders an expression as text with whitespace runs collapsed, so that
 * annotations spread over several lines read as one.
 */
export function renderExpression(node: Parser.SyntaxNode, sourceCode: string): string {
  return getNodeText(node, sourceCode).replace(/\s+/g, ' ').trim();
}

/**
 * Unwraps a `decorated_definition` to the definition it decorates.
 */
export function unwrapDecorated(node: Parser.SyntaxNode): Parser.SyntaxNode {
  if (node.type !== PyDefinitionNodes.DECORATED_DEFINITION) {
    return node;
  }
  return node.childForFieldName('definition') ?? node;
}

/**
 * Function definitions sitting directly in a block or module, decorated or not.
 */
export function directFunctionDefinitions(container: Parser.SyntaxNode): Parser.SyntaxNode[] {
  return container.namedChildren
    .map(unwrapDecorated)
    .filter((child) => child.type === PyDefinitionNodes.FUNCTION_DEFINITION);
}

/**
 * Whether a function_definition is declared with `async def`.
 */
export function isAsyncDefinition(node: Parser.SyntaxNode): boolean {
  return node.children.some((child) => child.type === PyDefinitionNodes.ASYNC);
}

/**
 * One module reference from an import statement.
 */
export interface ImportReference {
  moduleName: string;
  line: number;
  /** `from . import x` or `from .pkg import x` */
  isRelative: boolean;
  /** Came from a `from ... import` statement */
  isFromImport: boolean;
}

/**
 * Collects module names from `import` and `from ... import` statements in
 * source order. `from __future__` imports are not module references.
 */
export function collectImports(root: Parser.SyntaxNode, sourceCode: string): ImportReference[] {
  const imports: ImportReference[] = [];
  const statements = findNodesOfType(root, [
    PyImportNodes.IMPORT_STATEMENT,
    PyImportNodes.IMPORT_FROM_STATEMENT,
  ]);

  for (const statement of statements) {
    const { line } = getLocation(statement);

    if (statement.type === PyImportNodes.IMPORT_STATEMENT) {
      // import a.b, c as d
      for (const nameNode of statement.namedChildren) {
        const dotted = nameNode.type === PyImportNodes.ALIASED_IMPORT
          ? nameNode.childForFieldName('name')
          : nameNode;
        if (dotted?.type === PyImportNodes.DOTTED_NAME) {
          imports.push({
            moduleName: getNodeText(dotted, sourceCode),
            line,
            isRelative: false,
            isFromImport: false,
          });
        }
      }
      continue;
    }

    // from a.b import x
    const moduleNode = statement.childForFieldName('module_name');
    if (!moduleNode) continue;
    imports.push({
      moduleName: getNodeText(moduleNode, sourceCode),
      line,
      isRelative: moduleNode.type === PyImportNodes.RELATIVE_IMPORT,
      isFromImport: true,
    });
  }

  return imports;
}

/**
 * Callee text of a call node with whitespace removed (`os . system` reads
 * as `os.system`).
 */
export function getCalleeName(callNode: Parser.SyntaxNode, sourceCode: string): string | null {
  const fn = callNode.childForFieldName('function');
  if (!fn) return null;
  return getNodeText(fn, sourceCode).replace(/\s+/g, '');
}
