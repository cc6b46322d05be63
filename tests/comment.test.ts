import { describe, it, expect } from 'vitest';
import {
  commentLine, commentRange, containsBlockComment, isBlockWrapped, isStyleType, uncommentLine,
  uncommentRange, unwrapBlock, wrapBlock,
} from '../src/core/comment.js';
import type { CommentStyle } from '../src/types/index.js';

const js: CommentStyle = { line: '//', block: ['/*', '*/'], supportsNesting: false, isJsxContext: false };
const css: CommentStyle = { block: ['/*', '*/'], supportsNesting: false, isJsxContext: false };
const yaml: CommentStyle = { line: '#', supportsNesting: false, isJsxContext: false };

describe('isStyleType', () => {
  it('accepts line and block only', () => {
    expect(isStyleType('line')).toBe(true);
    expect(isStyleType('block')).toBe(true);
    expect(isStyleType('Line')).toBe(false);
    expect(isStyleType(undefined)).toBe(false);
  });
});

describe('commentLine', () => {
  it('falls back to line markers when there is no block form', () => {
    expect(commentLine('x: 1', yaml, 'block')).toBe('# x: 1');
    expect(commentLine('x()', js, 'block')).toBe('/* x() */');
    expect(uncommentLine('/* x() */', js)).toBe('x()');
  });
});

// ─── Block detection ─────────────────────────────────────────────────

describe('containsBlockComment', () => {
  it('finds block comments at the start and mid-line', () => {
    expect(containsBlockComment(['/* a */'], js)).toBe(true);
    expect(containsBlockComment(['x = 1; /* note */'], js)).toBe(true);
  });

  it('needs both markers in order', () => {
    expect(containsBlockComment(['a * b / c'], js)).toBe(false);
    expect(containsBlockComment(['*/ x /*'], js)).toBe(false);
    expect(containsBlockComment(['# /* x */'], yaml)).toBe(false);
  });
});

describe('isBlockWrapped', () => {
  it('recognizes marker-only first and last lines', () => {
    expect(isBlockWrapped(['/*', 'x', '*/'], js)).toBe(true);
    expect(isBlockWrapped(['  /* */', 'x', '  */'], js)).toBe(true);
    expect(isBlockWrapped(['/* x */', 'y', '*/'], js)).toBe(false);
    expect(isBlockWrapped(['/*'], js)).toBe(false);
    expect(isBlockWrapped(['/*', '*/'], yaml)).toBe(false);
    expect(isBlockWrapped(['/*', '*/'], undefined)).toBe(false);
  });
});

describe('wrapBlock', () => {
  it('uses the smallest indentation of the non-blank lines', () => {
    expect(wrapBlock(['    a', '  b', ''], js)).toEqual(['  /*', '    a', '  b', '', '  */']);
  });

  it('leaves lines alone without a block form', () => {
    expect(wrapBlock(['a'], yaml)).toEqual(['a']);
  });

  it('is reversed by unwrapBlock', () => {
    const lines = ['\tf();', '\tg();'];
    expect(unwrapBlock(wrapBlock(lines, js), js)).toEqual(lines);
    expect(unwrapBlock(['a', 'b'], js)).toEqual(['a', 'b']);
  });
});

// ─── Ranges ──────────────────────────────────────────────────────────

describe('commentRange', () => {
  it('comments each line with its own style', () => {
    expect(commentRange(['a', 'b'], [js, yaml], js)).toEqual(['// a', '# b']);
    expect(commentRange([], [], js)).toEqual([]);
  });

  it('wraps a block request over several lines', () => {
    expect(commentRange(['a', 'b'], [js, js], js, 'block')).toEqual(['/*', 'a', 'b', '*/']);
  });

  it('comments line by line around existing block comments', () => {
    expect(commentRange(['/* a */', 'b'], [js, js], js, 'block')).toEqual(['// /* a */', '// b']);
    expect(commentRange(['/* a */', 'b'], [css, css], css, 'block')).toEqual(['/* /* a */ */', '/* b */']);
  });

  it('wraps around block comments when they nest', () => {
    const nesting: CommentStyle = { ...js, supportsNesting: true };
    expect(commentRange(['/* a */', 'b'], [nesting, nesting], nesting, 'block'))
      .toEqual(['/*', '/* a */', 'b', '*/']);
  });
});

describe('uncommentRange', () => {
  it('strips each line', () => {
    expect(uncommentRange(['// a', '  // b', 'c'], [js, js, js], js)).toEqual(['a', '  b', 'c']);
  });

  it('unwraps a wrapped selection', () => {
    expect(uncommentRange(['/*', '  a', '*/'], [js, js, js], js)).toEqual(['  a']);
  });
});
