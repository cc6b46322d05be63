/**
 * Comment text objects. Selections are returned as plain values; the host
 * decides how to apply them.
 */

import type { LineSpan, Selection, TextBuffer } from '../types/index.js';
import { getMarkers } from '../detection/regex.js';
import type { QuillContext } from '../core/context.js';
import { getCommentStyle, isCommented } from '../core/detect.js';

/** The run of consecutive commented lines around 1-indexed `line` */
export function findCommentBlockBounds(ctx: QuillContext, buffer: TextBuffer, line: number): LineSpan | undefined {
  if (!isCommented(ctx, buffer, line)) return undefined;

  let startLine = line;
  let endLine = line;
  while (startLine > 1 && isCommented(ctx, buffer, startLine - 1)) startLine--;
  while (endLine < buffer.lineCount() && isCommented(ctx, buffer, endLine + 1)) endLine++;
  return { startLine, endLine };
}

export interface LineContent {
  content: string;
  /** 0-indexed column of the first content character */
  startCol: number;
  /** 0-indexed, exclusive */
  endCol: number;
}

/** Comment text of a commented line and where it sits in the original line */
export function extractLineContent(ctx: QuillContext, buffer: TextBuffer, line: number): LineContent | undefined {
  const [text] = buffer.getLines(line - 1, line);
  if (!text) return undefined;
  const style = getCommentStyle(ctx, buffer, line - 1, 0);
  if (!style) return undefined;
  const markers = getMarkers(text, style);
  if (!markers) return undefined;

  let from = markers.endPos;
  let to = markers.endPos;
  if (markers.markerType === 'block' && style.block) {
    from = markers.startPos + style.block[0].length;
    to = markers.endPos - style.block[1].length;
  } else {
    to = text.length;
  }

  const inner = text.slice(from, to);
  const content = inner.trim();
  if (content === '') {
    return { content: '', startCol: markers.startPos, endCol: markers.startPos };
  }
  const startCol = from + inner.indexOf(content);
  return { content, startCol, endCol: startCol + content.length };
}

function lineLength(buffer: TextBuffer, line: number): number {
  const [text] = buffer.getLines(line - 1, line);
  return text === undefined ? 0 : text.length;
}

/** Character-wise selection from the first to the last comment character of the block */
export function selectInnerBlock(ctx: QuillContext, buffer: TextBuffer, line: number): Selection | undefined {
  const bounds = findCommentBlockBounds(ctx, buffer, line);
  if (!bounds) return undefined;
  const first = extractLineContent(ctx, buffer, bounds.startLine);
  const last = extractLineContent(ctx, buffer, bounds.endLine);
  if (!first || !last) return undefined;
  return {
    start: { line: bounds.startLine, col: first.startCol },
    end: { line: bounds.endLine, col: last.endCol },
    linewise: false,
  };
}

/** Whole lines of the comment block, markers included */
export function selectAroundBlock(ctx: QuillContext, buffer: TextBuffer, line: number): Selection | undefined {
  const bounds = findCommentBlockBounds(ctx, buffer, line);
  if (!bounds) return undefined;
  return {
    start: { line: bounds.startLine, col: 0 },
    end: { line: bounds.endLine, col: lineLength(buffer, bounds.endLine) },
    linewise: true,
  };
}

export function selectInnerLine(ctx: QuillContext, buffer: TextBuffer, line: number): Selection | undefined {
  if (!isCommented(ctx, buffer, line)) return undefined;
  const content = extractLineContent(ctx, buffer, line);
  if (!content) return undefined;
  return {
    start: { line, col: content.startCol },
    end: { line, col: content.endCol },
    linewise: false,
  };
}

export function selectAroundLine(ctx: QuillContext, buffer: TextBuffer, line: number): Selection | undefined {
  if (!isCommented(ctx, buffer, line)) return undefined;
  return {
    start: { line, col: 0 },
    end: { line, col: lineLength(buffer, line) },
    linewise: true,
  };
}
