import { describe, it, expect } from 'vitest';
import { createContext } from '../src/core/context.js';
import { MemoryBuffer } from '../src/core/buffer.js';
import {
  expandSelection, findAttachedDecorators, findDocComment, findFunctionBounds,
} from '../src/features/semantic.js';
import { FakeTreeProvider, type NodeSpec } from './fixtures/fake-tree.js';

const ctx = createContext();

const python = new MemoryBuffer([
  'import functools',
  '',
  '@functools.cache',
  '@trace',
  'def compute(n):',
  '    """Compute a value.',
  '    """',
  '    return n * 2',
  '',
  'print(compute(2))',
], { filetype: 'python' });

const typescript = new MemoryBuffer([
  '/**',
  ' * Adds one.',
  ' */',
  'function inc(n: number): number {',
  '  return n + 1;',
  '}',
  '',
  'inc(1);',
], { filetype: 'typescript' });

// ─── Python ──────────────────────────────────────────────────────────

describe('python functions', () => {
  it('finds decorators directly above the header', () => {
    expect(findAttachedDecorators(ctx, python, 5)).toEqual([3, 4]);
    expect(findAttachedDecorators(ctx, python, 3)).toEqual([]);
  });

  it('bounds the function by indentation, decorators included', () => {
    expect(findFunctionBounds(ctx, python, 8)).toEqual({ startLine: 3, endLine: 8 });
    expect(findFunctionBounds(ctx, python, 8, { includeDecorators: false })).toEqual({ startLine: 5, endLine: 8 });
  });

  it('finds the docstring inside the function', () => {
    expect(findDocComment(ctx, python, 5)).toEqual({ startLine: 6, endLine: 7 });
  });

  it('expands a selection to decorators and docstring', () => {
    expect(expandSelection(ctx, python, 5, 5)).toEqual({ startLine: 3, endLine: 7 });
    expect(expandSelection(ctx, python, 5, 8)).toEqual({ startLine: 3, endLine: 8 });
    expect(expandSelection(ctx, python, 5, 5, { includeDecorators: false, includeDocComments: false }))
      .toEqual({ startLine: 5, endLine: 5 });
  });

  it('reads a one-line docstring', () => {
    const buffer = new MemoryBuffer(['def f():', "    '''One line.'''", '    pass'], { filetype: 'python' });
    expect(findDocComment(ctx, buffer, 1)).toEqual({ startLine: 2, endLine: 2 });
  });
});

// ─── TypeScript ──────────────────────────────────────────────────────

describe('typescript functions', () => {
  it('finds the JSDoc block above the header', () => {
    expect(findDocComment(ctx, typescript, 4)).toEqual({ startLine: 1, endLine: 3 });
    expect(expandSelection(ctx, typescript, 4, 6)).toEqual({ startLine: 1, endLine: 6 });
  });

  it('includes the closing brace in the function bounds', () => {
    expect(findFunctionBounds(ctx, typescript, 5)).toEqual({ startLine: 4, endLine: 6 });
  });

  it('uses the nearest function node from the syntax tree', () => {
    // const inc = (n: number) => {
    //   return n + 1;
    // };
    const tree: NodeSpec = {
      type: 'program',
      range: [0, 0, 3, 0],
      children: [{
        type: 'lexical_declaration',
        range: [0, 0, 2, 2],
        children: [{
          type: 'arrow_function',
          range: [0, 12, 2, 1],
          children: [{
            type: 'statement_block',
            range: [0, 28, 2, 1],
            children: [{ type: 'return_statement', range: [1, 2, 1, 15] }],
          }],
        }],
      }],
    };
    const lines = ['const inc = (n: number) => {', '  return n + 1;', '};'];
    const buffer = new MemoryBuffer(lines, { filetype: 'typescript' });
    const withTree = createContext({ syntax: new FakeTreeProvider(tree, 'typescript') });

    expect(findFunctionBounds(withTree, buffer, 2)).toEqual({ startLine: 1, endLine: 3 });
    expect(findFunctionBounds(ctx, buffer, 2)).toBeUndefined();
  });
});

describe('unsupported input', () => {
  it('returns nothing for unknown filetypes and out-of-range lines', () => {
    const buffer = new MemoryBuffer(['def f():', '  pass'], { filetype: 'text' });
    expect(findFunctionBounds(ctx, buffer, 1)).toBeUndefined();
    expect(findDocComment(ctx, buffer, 1)).toBeUndefined();
    expect(findFunctionBounds(ctx, python, 0)).toBeUndefined();
    expect(findFunctionBounds(ctx, python, 11)).toBeUndefined();
  });
});
