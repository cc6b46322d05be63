/**
 * Semantic selection: grow a line range to cover the decorators and doc
 * comment that belong to a function.
 */

import type { LineSpan, TextBuffer } from '../types/index.js';
import type { SemanticConfig } from '../config/schema.js';
import { isBlank, leadingWhitespace } from '../util/strings.js';
import type { QuillContext } from '../core/context.js';

const DECORATOR_PATTERN = /^\s*@\w+/;

const DECORATOR_FILETYPES: ReadonlySet<string> = new Set([
  'python', 'typescript', 'javascript', 'typescriptreact', 'javascriptreact', 'java',
]);

const C_LIKE_FUNCTION = /^\s*\w+\s+\w+\s*\(.*\)\s*\{/;

const FUNCTION_PATTERNS: Record<string, RegExp> = {
  python: /^\s*def\s+\w+/,
  javascript: /^\s*function\s+\w+/,
  typescript: /^\s*function\s+\w+/,
  lua: /^\s*function\s+\w+/,
  c: C_LIKE_FUNCTION,
  cpp: C_LIKE_FUNCTION,
  java: C_LIKE_FUNCTION,
  rust: /^\s*fn\s+\w+/,
};

export const FUNCTION_NODE_TYPES: ReadonlySet<string> = new Set([
  'function_definition', 'function_declaration', 'method_definition', 'method_declaration',
  'function_item', 'function', 'arrow_function',
]);

const JSDOC_FILETYPES: ReadonlySet<string> = new Set([
  'javascript', 'typescript', 'javascriptreact', 'typescriptreact',
]);

const MAX_DOCSTRING_SEARCH_LINES = 20;

function filetypeOf(ctx: QuillContext, buffer: TextBuffer): string {
  return ctx.registry.canonicalId(buffer.filetype);
}

function allLines(buffer: TextBuffer): string[] {
  return buffer.getLines(0, buffer.lineCount());
}

// ─── Decorators ──────────────────────────────────────────────────────

/**
 * Lines of the decorators directly above `funcStart` (1-indexed), top
 * first. Stops at the first blank or non-decorator line.
 */
export function findAttachedDecorators(ctx: QuillContext, buffer: TextBuffer, funcStart: number): number[] {
  if (!DECORATOR_FILETYPES.has(filetypeOf(ctx, buffer))) return [];
  const lines = buffer.getLines(0, Math.max(0, funcStart - 1));
  const found: number[] = [];
  for (let lineNo = funcStart - 1; lineNo >= 1; lineNo--) {
    const text = lines[lineNo - 1];
    if (isBlank(text) || !DECORATOR_PATTERN.test(text)) break;
    found.unshift(lineNo);
  }
  return found;
}

// ─── Function bounds ─────────────────────────────────────────────────

function functionFromSyntax(ctx: QuillContext, buffer: TextBuffer, line: number): LineSpan | undefined {
  const provider = ctx.syntax;
  if (!provider || !provider.isAvailable(buffer)) return undefined;
  const [text] = buffer.getLines(line - 1, line);
  const col = text === undefined ? 0 : leadingWhitespace(text).length;

  let node = provider.smallestNodeAt(buffer, line - 1, col) ?? null;
  while (node) {
    if (FUNCTION_NODE_TYPES.has(node.type())) {
      const range = node.range();
      return { startLine: range.startRow + 1, endLine: range.endRow + 1 };
    }
    node = node.parent();
  }
  return undefined;
}

function functionStartFromPattern(lines: readonly string[], line: number, filetype: string): number | undefined {
  const pattern = FUNCTION_PATTERNS[filetype];
  if (!pattern) return undefined;
  for (let lineNo = line; lineNo >= 1; lineNo--) {
    if (pattern.test(lines[lineNo - 1])) return lineNo;
  }
  return undefined;
}

const CLOSING_LINE = /^\s*(?:[}\])]|end\b)/;

/**
 * Last line of the body: the line before the next non-blank line indented
 * no deeper than the header, or that line itself when it only closes the
 * body (`}`, `end`).
 */
function functionEndFromIndent(lines: readonly string[], funcStart: number): number {
  const headerIndent = leadingWhitespace(lines[funcStart - 1]).length;
  let lastBody = funcStart;
  for (let lineNo = funcStart + 1; lineNo <= lines.length; lineNo++) {
    const text = lines[lineNo - 1];
    if (isBlank(text)) continue;
    if (leadingWhitespace(text).length <= headerIndent) {
      return CLOSING_LINE.test(text) ? lineNo : lastBody;
    }
    lastBody = lineNo;
  }
  return lastBody;
}

/**
 * Bounds of the function around 1-indexed `line`: the nearest function
 * node from the syntax tree, or a header pattern plus indentation. The
 * span includes attached decorators when configured.
 */
export function findFunctionBounds(
  ctx: QuillContext,
  buffer: TextBuffer,
  line: number,
  options: Partial<SemanticConfig> = {},
): LineSpan | undefined {
  if (line < 1 || line > buffer.lineCount()) return undefined;
  const opts: SemanticConfig = { ...ctx.config.semantic, ...options };

  let span = functionFromSyntax(ctx, buffer, line);
  if (!span) {
    const lines = allLines(buffer);
    const start = functionStartFromPattern(lines, line, filetypeOf(ctx, buffer));
    if (start === undefined) return undefined;
    span = { startLine: start, endLine: functionEndFromIndent(lines, start) };
  }

  if (opts.includeDecorators) {
    const decorators = findAttachedDecorators(ctx, buffer, span.startLine);
    if (decorators.length > 0) span = { ...span, startLine: decorators[0] };
  }
  return span;
}

// ─── Doc comments ────────────────────────────────────────────────────

function pythonDocstring(buffer: TextBuffer, funcStart: number): LineSpan | undefined {
  const stop = Math.min(funcStart + MAX_DOCSTRING_SEARCH_LINES, buffer.lineCount());
  const lines = buffer.getLines(funcStart, stop);
  const first = lines.findIndex((text) => !isBlank(text));
  if (first === -1) return undefined;

  const opening = lines[first];
  const match = opening.match(/^\s*("""|''')/);
  if (!match) return undefined;
  const quote = match[1];
  const docStart = funcStart + first + 1;

  const openAt = opening.indexOf(quote);
  if (opening.indexOf(quote, openAt + quote.length) !== -1) {
    return { startLine: docStart, endLine: docStart };
  }
  for (let i = first + 1; i < lines.length; i++) {
    if (lines[i].includes(quote)) return { startLine: docStart, endLine: funcStart + i + 1 };
  }
  return undefined;
}

function jsdocAbove(buffer: TextBuffer, funcStart: number): LineSpan | undefined {
  const lines = buffer.getLines(0, Math.max(0, funcStart - 1));
  let lineNo = funcStart - 1;
  while (lineNo >= 1 && isBlank(lines[lineNo - 1])) lineNo--;
  if (lineNo < 1 || !/\*\/\s*$/.test(lines[lineNo - 1])) return undefined;

  const docEnd = lineNo;
  for (; lineNo >= 1; lineNo--) {
    if (/^\s*\/\*\*/.test(lines[lineNo - 1])) return { startLine: lineNo, endLine: docEnd };
  }
  return undefined;
}

/**
 * Doc comment attached to the function whose header is on `line`: a
 * Python docstring inside it, or a JSDoc block above it.
 */
export function findDocComment(ctx: QuillContext, buffer: TextBuffer, line: number): LineSpan | undefined {
  const filetype = filetypeOf(ctx, buffer);
  if (filetype === 'python') return pythonDocstring(buffer, line);
  if (JSDOC_FILETYPES.has(filetype)) return jsdocAbove(buffer, line);
  return undefined;
}

// ─── Expansion ───────────────────────────────────────────────────────

/**
 * Grow `[start, end]` to take in decorators above `start` and the doc
 * comment of the function starting there: a block above extends the
 * start, a docstring inside extends the end.
 */
export function expandSelection(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
  options: Partial<SemanticConfig> = {},
): LineSpan {
  const opts: SemanticConfig = { ...ctx.config.semantic, ...options };
  let startLine = start;
  let endLine = end;

  if (opts.includeDecorators) {
    const decorators = findAttachedDecorators(ctx, buffer, start);
    if (decorators.length > 0) startLine = Math.min(startLine, decorators[0]);
  }

  if (opts.includeDocComments) {
    const doc = findDocComment(ctx, buffer, start);
    if (doc) {
      if (doc.startLine < start) startLine = Math.min(startLine, doc.startLine);
      else endLine = Math.max(endLine, doc.endLine);
    }
  }

  return { startLine, endLine };
}
