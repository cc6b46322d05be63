/**
 * Comment engine: adds and removes markers across a list of lines.
 *
 * Pure functions over text. Each line carries its own resolved style;
 * `primary` (the style of the first non-blank line) decides multi-line
 * block wrapping.
 */

import type { CommentStyle, StyleType } from '../types/index.js';
import { add, getMarkers, strip } from '../detection/regex.js';
import { isBlank, leadingWhitespace } from '../util/strings.js';

export function isStyleType(value: unknown): value is StyleType {
  return value === 'line' || value === 'block';
}

// ─── Single lines ────────────────────────────────────────────────────

/** Comment one line; a block request falls back to line when there is no block form */
export function commentLine(line: string, style: CommentStyle, styleType: StyleType = 'line'): string {
  return add(line, style, styleType === 'block' && style.block !== undefined);
}

export function uncommentLine(line: string, style: CommentStyle): string {
  return strip(line, style);
}

// ─── Block detection ─────────────────────────────────────────────────

/** True when any line holds a block comment, at the start or mid-line */
export function containsBlockComment(lines: readonly string[], style: CommentStyle): boolean {
  if (!style.block) return false;
  const [open, close] = style.block;
  return lines.some((line) => {
    if (getMarkers(line, style)?.markerType === 'block') return true;
    const openAt = line.indexOf(open);
    return openAt !== -1 && line.indexOf(close, openAt + open.length) !== -1;
  });
}

/**
 * True when the first line is only the open marker (or `open close`) and
 * the last line is only the close marker.
 */
export function isBlockWrapped(lines: readonly string[], style: CommentStyle | undefined): boolean {
  if (!style?.block || lines.length < 2) return false;
  const [open, close] = style.block;
  const first = lines[0].trim();
  const last = lines[lines.length - 1].trim();
  return (first === open || first === `${open} ${close}`) && last === close;
}

/** Surround `lines` with open/close marker lines at the smallest indentation */
export function wrapBlock(lines: readonly string[], style: CommentStyle): string[] {
  if (!style.block) return [...lines];
  const [open, close] = style.block;

  let indent: string | undefined;
  for (const line of lines) {
    if (isBlank(line)) continue;
    const ws = leadingWhitespace(line);
    if (indent === undefined || ws.length < indent.length) indent = ws;
  }
  const pad = indent ?? '';

  return [pad + open, ...lines, pad + close];
}

export function unwrapBlock(lines: readonly string[], style: CommentStyle): string[] {
  if (!isBlockWrapped(lines, style)) return [...lines];
  return lines.slice(1, -1);
}

// ─── Ranges ──────────────────────────────────────────────────────────

/**
 * Comment every line. With a block request over several lines the
 * selection is wrapped, unless it already holds block comments: then it is
 * wrapped only when the language nests them, otherwise commented line by
 * line (with line markers when the language has them).
 */
export function commentRange(
  lines: readonly string[],
  styles: readonly CommentStyle[],
  primary: CommentStyle,
  styleType: StyleType = 'line',
): string[] {
  if (lines.length === 0) return [];
  if (lines.length === 1) return [commentLine(lines[0], styles[0] ?? primary, styleType)];

  if (styleType === 'block' && primary.block) {
    if (!containsBlockComment(lines, primary) || primary.supportsNesting) {
      return wrapBlock(lines, primary);
    }
    const fallback: StyleType = primary.line ? 'line' : 'block';
    return lines.map((line, i) => commentLine(line, styles[i] ?? primary, fallback));
  }

  return lines.map((line, i) => commentLine(line, styles[i] ?? primary, 'line'));
}

/** Uncomment every line, or unwrap a block-wrapped selection */
export function uncommentRange(
  lines: readonly string[],
  styles: readonly CommentStyle[],
  primary: CommentStyle,
): string[] {
  if (isBlockWrapped(lines, primary)) return unwrapBlock(lines, primary);
  return lines.map((line, i) => uncommentLine(line, styles[i] ?? primary));
}
