/**
 * Line-local comment detection and rewriting.
 *
 * Every function looks at one line and one resolved style; neighbouring
 * lines are never consulted. Markers that sit inside a quoted string are
 * ignored.
 */

import type { CommentMarkers, CommentStyle } from '../types/index.js';
import { isBlank, isInsideStringLiteral, leadingWhitespace } from '../util/strings.js';

// ─── Marker location ─────────────────────────────────────────────────

/**
 * A single-line block comment: the open marker directly after the
 * indentation, the first close marker after it, and only whitespace
 * following the close.
 */
function findBlock(line: string, style: CommentStyle): CommentMarkers | undefined {
  if (!style.block) return undefined;
  const [open, close] = style.block;
  const start = leadingWhitespace(line).length;

  if (!line.startsWith(open, start) || isInsideStringLiteral(line, start)) return undefined;

  // String state for the close marker is scanned from after the open
  // marker, so a quote-based opener (`"""`) does not count as a string.
  const bodyStart = start + open.length;
  const body = line.slice(bodyStart);
  let idx = body.indexOf(close);
  while (idx !== -1 && isInsideStringLiteral(body, idx)) {
    idx = body.indexOf(close, idx + 1);
  }
  if (idx === -1) return undefined;

  const endPos = bodyStart + idx + close.length;
  if (line.slice(endPos).trim() !== '') return undefined;

  return { startPos: start, endPos, markerType: 'block' };
}

function findLine(line: string, style: CommentStyle): CommentMarkers | undefined {
  if (!style.line) return undefined;
  const start = leadingWhitespace(line).length;
  if (!line.startsWith(style.line, start) || isInsideStringLiteral(line, start)) return undefined;
  return { startPos: start, endPos: start + style.line.length, markerType: 'line' };
}

/**
 * Locate the comment markers on `line`. Block is tried before line so a
 * line marker that prefixes the block opener (`--` vs `--[[`) does not
 * misclassify a block comment.
 */
export function getMarkers(line: string, style: CommentStyle): CommentMarkers | undefined {
  if (isBlank(line)) return undefined;
  return findBlock(line, style) ?? findLine(line, style);
}

export function isCommented(line: string, style: CommentStyle): boolean {
  return getMarkers(line, style) !== undefined;
}

// ─── Rewriting ───────────────────────────────────────────────────────

/**
 * Remove one comment (a block pair or a line marker) and at most one
 * whitespace character beside each removed marker. Indentation is kept;
 * a line with no recognised comment comes back unchanged.
 */
export function strip(line: string, style: CommentStyle): string {
  const markers = getMarkers(line, style);
  if (!markers) return line;

  const indent = line.slice(0, markers.startPos);

  if (markers.markerType === 'block' && style.block) {
    const [open, close] = style.block;
    const inner = line.slice(markers.startPos + open.length, markers.endPos - close.length);
    return indent + inner.replace(/^\s/, '').replace(/\s$/, '');
  }

  return indent + line.slice(markers.endPos).replace(/^\s/, '');
}

/**
 * Comment out `line`. Line comments are preferred unless `useBlock` is set
 * or the style has no line form. Blank lines get a bare marker.
 */
export function add(line: string, style: CommentStyle, useBlock = false): string {
  const indent = leadingWhitespace(line);

  if (isBlank(line)) {
    if (useBlock && style.block) return `${indent}${style.block[0]} ${style.block[1]}`;
    if (style.line) return indent + style.line;
    if (style.block) return `${indent}${style.block[0]} ${style.block[1]}`;
    return line;
  }

  const content = line.slice(indent.length);

  if (style.block && (useBlock || !style.line)) {
    return `${indent}${style.block[0]} ${content} ${style.block[1]}`;
  }
  if (style.line) return `${indent}${style.line} ${content}`;
  return line;
}

/** True when the style offers no way to comment anything */
export function isEmptyStyle(style: CommentStyle | undefined): boolean {
  return !style || (style.line === undefined && style.block === undefined);
}
