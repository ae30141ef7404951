/**
 * Source extractor: turns one Python source text into function and class
 * signatures.
 *
 * The walk is a depth-first pre-order over the tree-sitter tree, so results
 * follow reading order and a nested definition comes right after the
 * definition that contains it.
 */
import type Parser from 'tree-sitter';
import { ParseError } from '../../utils/errors.js';
import { readSourceFile } from '../../utils/file-system.js';
import { walkTree } from '../../validators/tree-sitter/TreeSitterUtils.js';
import {
  PyDefinitionNodes,
  createPythonParser,
  parsePython,
} from '../../validators/tree-sitter/python-ast.js';
import { buildParentMap, isClassMember } from './parent-map.js';
import { extractCallableSignature, extractClassSignature } from './signature.js';
import type {
  AnalysisResult,
  CallableSignature,
  ClassSignature,
} from './types.js';

export interface ExtractOptions {
  /** Reuse a parser across calls; a new one is created otherwise */
  parser?: Parser;
}

/**
 * Extracts signatures from Python source text.
 *
 * @param sourceId - Names the source in error messages only
 * @throws ParseError when the text is not valid Python
 */
export function extractSignatures(
  sourceText: string,
  sourceId: string,
  options: ExtractOptions = {}
): AnalysisResult {
  const parser = options.parser ?? createPythonParser();
  const parsed = parsePython(parser, sourceText);

  if (!parsed.isWellFormed) {
    const [first] = parsed.syntaxErrors;
    throw new ParseError(sourceId, first.line, first.column, first.message);
  }

  const parents = buildParentMap(parsed.root);
  const functions: CallableSignature[] = [];
  const classes: ClassSignature[] = [];

  walkTree(parsed.root, (node) => {
    switch (node.type) {
      case PyDefinitionNodes.FUNCTION_DEFINITION:
        // Methods are picked up by their class's direct body scan.
        if (!isClassMember(node, parents)) {
          functions.push(extractCallableSignature(node, sourceText));
        }
        break;
      case PyDefinitionNodes.CLASS_DEFINITION:
        classes.push(extractClassSignature(node, sourceText));
        break;
      default:
        break;
    }
  });

  return { functions, classes };
}

/**
 * Reads a file and extracts its signatures.
 *
 * @throws NotFoundError when the file cannot be opened
 * @throws ParseError when the file is not valid Python
 */
export async function extractFile(
  filePath: string,
  options: ExtractOptions = {}
): Promise<AnalysisResult> {
  const source = await readSourceFile(filePath);
  return extractSignatures(source, filePath, options);
}

/**
 * Finds a signature by name. `name` matches a top-level function,
 * `Class.method` a method of a class and `Outer.Inner.method` a method of a
 * class nested inside `Outer`. Nesting is judged by line ranges. The first
 * match in discovery order wins.
 */
export function findCallable(
  result: AnalysisResult,
  qualifiedName: string
): CallableSignature | undefined {
  const segments = qualifiedName.split('.');
  const methodName = segments.pop();
  if (methodName === undefined) return undefined;
  if (segments.length === 0) {
    return result.functions.find((fn) => fn.name === methodName);
  }

  for (const cls of result.classes) {
    if (!matchesClassPath(cls, segments, result.classes)) continue;
    const method = cls.methods.find((m) => m.name === methodName);
    if (method) return method;
  }
  return undefined;
}

function matchesClassPath(
  cls: ClassSignature,
  path: readonly string[],
  classes: readonly ClassSignature[]
): boolean {
  const [name, ...outer] = [...path].reverse();
  if (cls.name !== name) return false;

  let inner = cls;
  for (const outerName of outer) {
    const enclosing = classes.find((candidate) =>
      candidate !== inner &&
      candidate.name === outerName &&
      candidate.startLine <= inner.startLine &&
      candidate.endLine >= inner.endLine
    );
    if (!enclosing) return false;
    inner = enclosing;
  }
  return true;
}
