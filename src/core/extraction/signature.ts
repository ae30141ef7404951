/**
 * Conversion of tree-sitter definition nodes into signatures.
 */
import type Parser from 'tree-sitter';
import { getNodeLines, getNodeText } from '../../validators/tree-sitter/TreeSitterUtils.js';
import {
  PyParameterNodes,
  PyStatementNodes,
  directFunctionDefinitions,
  isAsyncDefinition,
  renderExpression,
} from '../../validators/tree-sitter/python-ast.js';
import type { ArgumentSpec, CallableSignature, ClassSignature } from './types.js';

/**
 * Builds the signature of a `function_definition` node.
 */
export function extractCallableSignature(
  node: Parser.SyntaxNode,
  sourceCode: string
): CallableSignature {
  const nameNode = node.childForFieldName('name');
  const paramsNode = node.childForFieldName('parameters');
  const returnTypeNode = node.childForFieldName('return_type');
  const { startLine, endLine } = getNodeLines(node);

  return {
    name: nameNode ? getNodeText(nameNode, sourceCode) : '',
    arguments: paramsNode ? extractArguments(paramsNode, sourceCode) : [],
    returnType: returnTypeNode ? renderExpression(returnTypeNode, sourceCode) : undefined,
    docstring: extractDocstring(node, sourceCode),
    startLine,
    endLine,
    isAsync: isAsyncDefinition(node),
  };
}

/**
 * Builds the signature of a `class_definition` node, including the
 * signatures of the functions defined directly in its body.
 */
export function extractClassSignature(
  node: Parser.SyntaxNode,
  sourceCode: string
): ClassSignature {
  const nameNode = node.childForFieldName('name');
  const body = node.childForFieldName('body');
  const { startLine, endLine } = getNodeLines(node);

  return {
    name: nameNode ? getNodeText(nameNode, sourceCode) : '',
    baseNames: extractBaseNames(node, sourceCode),
    docstring: extractDocstring(node, sourceCode),
    methods: body
      ? directFunctionDefinitions(body).map((method) => extractCallableSignature(method, sourceCode))
      : [],
    startLine,
    endLine,
  };
}

/**
 * Positional bases only; `metaclass=...` and `**kwargs` are class keywords.
 */
function extractBaseNames(node: Parser.SyntaxNode, sourceCode: string): string[] {
  const superclasses = node.childForFieldName('superclasses');
  if (!superclasses) return [];

  return superclasses.namedChildren
    .filter((child) =>
      child.type !== PyStatementNodes.KEYWORD_ARGUMENT &&
      child.type !== PyStatementNodes.DICTIONARY_SPLAT &&
      child.type !== PyStatementNodes.COMMENT
    )
    .map((child) => renderExpression(child, sourceCode));
}

/**
 * Walks a `parameters` node and buckets each parameter by kind. The result
 * is always positional, *args, keyword-only, **kwargs.
 */
export function extractArguments(
  paramsNode: Parser.SyntaxNode,
  sourceCode: string
): ArgumentSpec[] {
  const positional: ArgumentSpec[] = [];
  const keywordOnly: ArgumentSpec[] = [];
  let variadicPositional: ArgumentSpec | undefined;
  let variadicKeyword: ArgumentSpec | undefined;
  let afterStar = false;

  for (const param of paramsNode.namedChildren) {
    switch (param.type) {
      case PyParameterNodes.POSITIONAL_SEPARATOR:
        break;

      case PyParameterNodes.KEYWORD_SEPARATOR:
        afterStar = true;
        break;

      case PyParameterNodes.LIST_SPLAT_PATTERN:
      case PyParameterNodes.DICTIONARY_SPLAT_PATTERN:
      case PyParameterNodes.TYPED_PARAMETER: {
        const spec = readParameter(param, sourceCode);
        if (!spec) break;
        if (spec.kind === 'variadic_positional') {
          variadicPositional ??= spec;
          afterStar = true;
        } else if (spec.kind === 'variadic_keyword') {
          variadicKeyword ??= spec;
        } else if (afterStar) {
          keywordOnly.push({ ...spec, kind: 'keyword_only' });
        } else {
          positional.push(spec);
        }
        break;
      }

      case PyParameterNodes.IDENTIFIER:
      case PyParameterNodes.DEFAULT_PARAMETER:
      case PyParameterNodes.TYPED_DEFAULT_PARAMETER: {
        const spec = readParameter(param, sourceCode);
        if (!spec) break;
        if (afterStar) {
          keywordOnly.push({ ...spec, kind: 'keyword_only' });
        } else {
          positional.push(spec);
        }
        break;
      }

      default:
        // comments and legacy tuple parameters
        break;
    }
  }

  return [
    ...positional,
    ...(variadicPositional ? [variadicPositional] : []),
    ...keywordOnly,
    ...(variadicKeyword ? [variadicKeyword] : []),
  ];
}

/**
 * Reads name, annotation and splat kind from one parameter node.
 * Keyword-only placement is decided by the caller.
 */
function readParameter(param: Parser.SyntaxNode, sourceCode: string): ArgumentSpec | null {
  switch (param.type) {
    case PyParameterNodes.IDENTIFIER:
      return { name: getNodeText(param, sourceCode), kind: 'positional' };

    case PyParameterNodes.LIST_SPLAT_PATTERN:
    case PyParameterNodes.DICTIONARY_SPLAT_PATTERN: {
      const name = splatName(param, sourceCode);
      if (!name) return null;
      return {
        name,
        kind: param.type === PyParameterNodes.LIST_SPLAT_PATTERN
          ? 'variadic_positional'
          : 'variadic_keyword',
      };
    }

    case PyParameterNodes.TYPED_PARAMETER: {
      // `name: T`, `*args: T` or `**kwargs: T`; the type sits in a field,
      // the target is the first named child.
      const target = param.namedChildren[0];
      const typeNode = param.childForFieldName('type');
      if (!target) return null;
      const typeAnnotation = typeNode ? renderExpression(typeNode, sourceCode) : undefined;
      const base = readParameter(target, sourceCode);
      return base ? { ...base, typeAnnotation } : null;
    }

    case PyParameterNodes.DEFAULT_PARAMETER:
    case PyParameterNodes.TYPED_DEFAULT_PARAMETER: {
      const nameNode = param.childForFieldName('name');
      const typeNode = param.childForFieldName('type');
      if (!nameNode) return null;
      return {
        name: getNodeText(nameNode, sourceCode),
        typeAnnotation: typeNode ? renderExpression(typeNode, sourceCode) : undefined,
        kind: 'positional',
      };
    }

    default:
      return null;
  }
}

function splatName(param: Parser.SyntaxNode, sourceCode: string): string | null {
  const identifier = param.namedChildren.find((child) => child.type === PyParameterNodes.IDENTIFIER);
  return identifier ? getNodeText(identifier, sourceCode) : null;
}

/**
 * The docstring of a function or class: the first statement of its body,
 * when that statement is a lone plain string literal. The text between the
 * quotes is returned as written.
 */
export function extractDocstring(
  definition: Parser.SyntaxNode,
  sourceCode: string
): string | undefined {
  const body = definition.childForFieldName('body');
  if (!body) return undefined;

  const firstStatement = body.namedChildren.find((child) => child.type !== PyStatementNodes.COMMENT);
  if (firstStatement?.type !== PyStatementNodes.EXPRESSION_STATEMENT) return undefined;
  if (firstStatement.namedChildCount !== 1) return undefined;

  const literal = firstStatement.namedChildren[0];
  if (literal?.type !== PyStatementNodes.STRING) return undefined;

  const start = literal.children.find((child) => child.type === PyStatementNodes.STRING_START);
  const end = literal.children.find((child) => child.type === PyStatementNodes.STRING_END);
  if (!start || !end) return undefined;

  // f-strings and bytes literals are not docstrings
  if (/[fFbB]/.test(getNodeText(start, sourceCode))) return undefined;

  return sourceCode.slice(start.endIndex, end.startIndex);
}
