/**
 * Tests for shared tree-sitter utility functions.
 */
import { describe, it, expect } from 'vitest';
import {
  createContext,
  getNodeText,
  getLocation,
  findNodesOfType,
  walkTree,
  getNodeLines,
  isMissingNode,
  findSyntaxErrors,
} from '../../../../src/validators/tree-sitter/TreeSitterUtils.js';
import { createPythonParser } from '../../../../src/validators/tree-sitter/python-ast.js';

const parser = createPythonParser();

function parse(source: string) {
  const ctx = createContext(parser, source);
  return { root: ctx.tree.rootNode, ctx };
}

describe('createContext', () => {
  it('should hold the tree and the source', () => {
    const { root, ctx } = parse('x = 1\n');

    expect(ctx.sourceCode).toBe('x = 1\n');
    expect(root.type).toBe('module');
  });
});

describe('getNodeText and getLocation', () => {
  it('should slice the source and convert to 1-based positions', () => {
    const source = 'x = 1\ny = compute(2)\n';
    const { root } = parse(source);
    const [call] = findNodesOfType(root, ['call']);

    expect(getNodeText(call, source)).toBe('compute(2)');
    expect(getLocation(call)).toEqual({ line: 2, column: 5 });
  });
});

describe('findNodesOfType', () => {
  it('should return matches in pre-order', () => {
    const source = 'def a():\n    def b():\n        pass\n\ndef c():\n    pass\n';
    const { root } = parse(source);

    const names = findNodesOfType(root, ['function_definition']).map((fn) => {
      const name = fn.childForFieldName('name');
      return name ? getNodeText(name, source) : '';
    });

    expect(names).toEqual(['a', 'b', 'c']);
  });
});

describe('walkTree', () => {
  it('should skip children when the callback returns false', () => {
    const { root } = parse('def a():\n    x = call()\n');
    const seen: string[] = [];

    walkTree(root, (node) => {
      seen.push(node.type);
      return node.type !== 'function_definition';
    });

    expect(seen).toEqual(['module', 'function_definition']);
  });
});

describe('getNodeLines', () => {
  it('should report an inclusive 1-based span', () => {
    const { root } = parse('\n\ndef f():\n    a = 1\n    return a\n');
    const [fn] = findNodesOfType(root, ['function_definition']);

    expect(getNodeLines(fn)).toEqual({ startLine: 3, endLine: 5 });
  });
});

describe('isMissingNode', () => {
  it('should not treat the root of an empty file as missing', () => {
    expect(isMissingNode(parse('').root)).toBe(false);
  });
});

describe('findSyntaxErrors', () => {
  it('should find nothing in valid code', () => {
    const source = 'def f(x):\n    return x\n';

    expect(findSyntaxErrors(parse(source).root, source)).toEqual([]);
  });

  it('should report invalid code with a location', () => {
    const source = 'def f(:\n    pass\n';
    const errors = findSyntaxErrors(parse(source).root, source);

    expect(errors.length).toBeGreaterThan(0);
    expect(errors[0].line).toBeGreaterThanOrEqual(1);
    expect(errors[0].message).toMatch(/^(invalid syntax|missing ')/);
  });
});
