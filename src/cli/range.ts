/**
 * Line-range arguments: `N` or `A:B`, 1-indexed and inclusive. An omitted
 * range means the whole file.
 */

import type { LineSpan, Result } from '../types/index.js';
import { ok, fail } from '../util/errors.js';

const SINGLE = /^\d+$/;
const SPAN = /^(\d+):(\d+)$/;

export function parseLineRange(spec: string | undefined, lineCount: number): Result<LineSpan> {
  if (spec === undefined) return ok({ startLine: 1, endLine: Math.max(1, lineCount) });
  const text = spec.trim();

  let span: LineSpan;
  const pair = text.match(SPAN);
  if (pair) {
    span = { startLine: Number(pair[1]), endLine: Number(pair[2]) };
  } else if (SINGLE.test(text)) {
    span = { startLine: Number(text), endLine: Number(text) };
  } else {
    return fail('invalid-range', `Invalid line range "${spec}": expected N or A:B`);
  }

  if (span.startLine < 1 || span.endLine < span.startLine || span.endLine > lineCount) {
    return fail('invalid-range', `Invalid line range "${spec}": file has ${lineCount} line(s)`);
  }
  return ok(span);
}

/** A single 1-indexed line number */
export function parseLineNumber(spec: string, lineCount: number): Result<number> {
  const range = parseLineRange(spec, lineCount);
  if (!range.ok) return range;
  if (range.value.startLine !== range.value.endLine) {
    return fail('invalid-range', `Expected a single line, got "${spec}"`);
  }
  return ok(range.value.startLine);
}
