import { describe, it, expect } from 'vitest';
import { createContext } from '../src/core/context.js';
import { MemoryBuffer } from '../src/core/buffer.js';
import {
  extractLineContent, findCommentBlockBounds, selectAroundBlock, selectAroundLine, selectInnerBlock,
  selectInnerLine,
} from '../src/features/textobjects.js';

const ctx = createContext();
const buffer = new MemoryBuffer([
  'const a = 1;',
  '// first line',
  '//   second',
  'const b = 2;',
  '  /* block */',
  '//',
], { filetype: 'javascript' });

describe('findCommentBlockBounds', () => {
  it('spans consecutive commented lines', () => {
    expect(findCommentBlockBounds(ctx, buffer, 3)).toEqual({ startLine: 2, endLine: 3 });
    expect(findCommentBlockBounds(ctx, buffer, 6)).toEqual({ startLine: 5, endLine: 6 });
    expect(findCommentBlockBounds(ctx, buffer, 1)).toBeUndefined();
  });
});

describe('extractLineContent', () => {
  it('locates the text after a line marker', () => {
    expect(extractLineContent(ctx, buffer, 3)).toEqual({ content: 'second', startCol: 5, endCol: 11 });
  });

  it('locates the text between block markers', () => {
    expect(extractLineContent(ctx, buffer, 5)).toEqual({ content: 'block', startCol: 5, endCol: 10 });
  });

  it('collapses an empty comment onto its marker', () => {
    expect(extractLineContent(ctx, buffer, 6)).toEqual({ content: '', startCol: 0, endCol: 0 });
    expect(extractLineContent(ctx, buffer, 1)).toBeUndefined();
  });
});

// ─── Selections ──────────────────────────────────────────────────────

describe('block selections', () => {
  it('selects the inner text character-wise', () => {
    expect(selectInnerBlock(ctx, buffer, 3)).toEqual({
      start: { line: 2, col: 3 }, end: { line: 3, col: 11 }, linewise: false,
    });
  });

  it('selects whole lines around', () => {
    expect(selectAroundBlock(ctx, buffer, 2)).toEqual({
      start: { line: 2, col: 0 }, end: { line: 3, col: 11 }, linewise: true,
    });
  });

  it('selects nothing on code', () => {
    expect(selectInnerBlock(ctx, buffer, 4)).toBeUndefined();
    expect(selectAroundBlock(ctx, buffer, 4)).toBeUndefined();
  });
});

describe('line selections', () => {
  it('selects the comment text of one line', () => {
    expect(selectInnerLine(ctx, buffer, 5)).toEqual({
      start: { line: 5, col: 5 }, end: { line: 5, col: 10 }, linewise: false,
    });
    expect(selectAroundLine(ctx, buffer, 5)).toEqual({
      start: { line: 5, col: 0 }, end: { line: 5, col: 13 }, linewise: true,
    });
  });

  it('selects an empty span in an empty comment', () => {
    expect(selectInnerLine(ctx, buffer, 6)).toEqual({
      start: { line: 6, col: 0 }, end: { line: 6, col: 0 }, linewise: false,
    });
  });

  it('selects nothing on code', () => {
    expect(selectInnerLine(ctx, buffer, 1)).toBeUndefined();
    expect(selectAroundLine(ctx, buffer, 4)).toBeUndefined();
  });
});
