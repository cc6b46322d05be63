/**
 * String helpers shared by the detectors and the line-local features.
 */

/** Escape regex metacharacters so `s` matches literally */
export function escapeLiteral(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `columnIndex` (0-indexed) falls inside a single- or
 * double-quoted string literal. Scans `[0, columnIndex)` once, honoring
 * backslash escapes. A quote of one kind never toggles state while inside
 * the other kind. Backticks, triple quotes and strings spanning lines are
 * not tracked.
 */
export function isInsideStringLiteral(line: string, columnIndex: number): boolean {
  let inSingle = false;
  let inDouble = false;
  let escaped = false;
  const end = Math.min(columnIndex, line.length);

  for (let i = 0; i < end; i++) {
    const ch = line[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
    } else if (ch === '"' && !inSingle) {
      inDouble = !inDouble;
    } else if (ch === "'" && !inDouble) {
      inSingle = !inSingle;
    }
  }

  return inSingle || inDouble;
}

export function isBlank(line: string): boolean {
  return line.trim() === '';
}

export function leadingWhitespace(line: string): string {
  const m = line.match(/^\s*/);
  return m ? m[0] : '';
}

/** Visual width of `text`, expanding tabs to the next multiple of `tabWidth` */
export function displayWidth(text: string, tabWidth = 8): number {
  let width = 0;
  for (const ch of text) {
    if (ch === '\t') {
      width += tabWidth - (width % tabWidth);
    } else {
      width += 1;
    }
  }
  return width;
}

/**
 * Find `needle` in `line` at or after `from`, skipping occurrences that
 * sit inside a quoted string. Returns -1 when none qualifies.
 */
export function indexOutsideString(line: string, needle: string, from = 0): number {
  let idx = line.indexOf(needle, from);
  while (idx !== -1) {
    if (!isInsideStringLiteral(line, idx)) return idx;
    idx = line.indexOf(needle, idx + 1);
  }
  return -1;
}
