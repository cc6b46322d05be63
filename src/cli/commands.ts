/**
 * quill CLI command implementations.
 *
 * Each command loads configuration, opens the file as a buffer, runs one
 * library operation and writes the file back (or prints it with
 * `dryRun`). Commands return an exit code and print through a Reporter so
 * they can run without a terminal.
 */

import { resolve } from 'node:path';
import type { LineSpan, QuillError, Result, Selection, StyleType } from '../types/index.js';
import { ConfigError } from '../util/errors.js';
import { describeConfigSource, loadConfig, type LoadedConfig } from '../config/load.js';
import type { QuillConfigInput } from '../config/schema.js';
import { createContext, withSyntax, type QuillContext } from '../core/context.js';
import { getCommentStyle, isCommented, isInCommentNode } from '../core/detect.js';
import { isStyleType } from '../core/comment.js';
import { commentLines, toggleLines, uncommentLines } from '../core/toggle.js';
import { isInString } from '../detection/syntax-tree.js';
import { TREE_SITTER_FILETYPES, TreeSitterProvider } from '../detection/tree-sitter.js';
import { alignLines } from '../features/align.js';
import { normalizeRange } from '../features/normalize.js';
import { convertToBlock, convertToLine, detectCurrentStyle } from '../features/convert.js';
import { listRegions, toggleBufferRegions } from '../features/debug.js';
import { expandSelection, findFunctionBounds } from '../features/semantic.js';
import {
  selectAroundBlock, selectAroundLine, selectInnerBlock, selectInnerLine,
} from '../features/textobjects.js';
import { loadTextFile, renderTextFile, saveTextFile, type TextFile } from '../project/files.js';
import { listProjectRegions, toggleProjectRegions } from '../project/toggle.js';
import { parseLineNumber, parseLineRange } from './range.js';
import {
  C, formatError, formatLineDiff, formatSelection, formatStyle, formatSuccess, formatWarning,
} from './format.js';

// ─── Plumbing ────────────────────────────────────────────────────────

export interface Reporter {
  /** Results */
  out(text: string): void;
  /** Diagnostics */
  err(text: string): void;
}

export const consoleReporter: Reporter = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export interface CommonOptions {
  /** Override the filetype inferred from the file extension */
  filetype?: string;
  /** Set false to skip loading tree-sitter grammars */
  syntax?: boolean;
  dryRun?: boolean;
  /** Directory that holds .quill/config.json (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

interface Session {
  ctx: QuillContext;
  file: TextFile;
  loaded: LoadedConfig;
}

function loadContext(
  common: CommonOptions,
  flags: QuillConfigInput,
  root = common.cwd ?? process.cwd(),
): { ctx: QuillContext; loaded: LoadedConfig } {
  const loaded = loadConfig({ root, flags, env: common.env, home: common.home });
  return { ctx: createContext({ config: loaded.config }), loaded };
}

async function attachSyntax(ctx: QuillContext, file: TextFile, reporter: Reporter): Promise<QuillContext> {
  const filetype = ctx.registry.canonicalId(file.buffer.filetype);
  if (!TREE_SITTER_FILETYPES.includes(filetype)) return ctx;
  const provider = await TreeSitterProvider.load([filetype], {
    canonicalId: (id) => ctx.registry.canonicalId(id),
  });
  if (!provider.ok) {
    reporter.err(formatWarning(provider.error.message));
    return ctx;
  }
  return withSyntax(ctx, provider.value);
}

async function openSession(
  path: string,
  common: CommonOptions,
  reporter: Reporter,
  flags: QuillConfigInput = {},
): Promise<Session> {
  const { ctx, loaded } = loadContext(common, flags);
  const file = await loadTextFile(resolve(common.cwd ?? process.cwd(), path), ctx.registry, common.filetype);
  const withTree = common.syntax === false ? ctx : await attachSyntax(ctx, file, reporter);
  return { ctx: withTree, file, loaded };
}

/** Print the file (dry run) or save it when it changed */
async function finish(session: Session, common: CommonOptions, reporter: Reporter, summary: string): Promise<number> {
  if (common.dryRun) {
    reporter.out(renderTextFile(session.file));
    reporter.err(C.dim(`(dry run) ${summary}`));
    return 0;
  }
  if (session.file.buffer.modified) await saveTextFile(session.file);
  reporter.err(formatSuccess(summary));
  return 0;
}

function report(reporter: Reporter, error: QuillError): number {
  reporter.err(formatError(error));
  return 1;
}

/** Run a command body, turning configuration and I/O errors into exit code 1 */
async function guard(reporter: Reporter, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (err) {
    if (err instanceof ConfigError) {
      reporter.err(`${C.error('✗')} Invalid configuration: ${err.message}`);
    } else {
      reporter.err(`${C.error('✗')} ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}

function range(session: Session, spec: string | undefined): Result<LineSpan> {
  return parseLineRange(spec, session.file.buffer.lineCount());
}

// ─── toggle / comment / uncomment ────────────────────────────────────

export type ToggleMode = 'toggle' | 'comment' | 'uncomment';

export interface ToggleCommandOptions {
  mode: ToggleMode;
  /** `line` or `block` */
  style?: string;
}

export function runToggle(
  path: string,
  rangeSpec: string | undefined,
  options: ToggleCommandOptions,
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    let styleType: StyleType | undefined;
    if (options.style !== undefined) {
      if (!isStyleType(options.style)) {
        return report(reporter, { kind: 'invalid-option', message: "Invalid style_type: must be 'line' or 'block'" });
      }
      styleType = options.style;
    }

    const session = await openSession(path, common, reporter);
    const span = range(session, rangeSpec);
    if (!span.ok) return report(reporter, span.error);
    const { startLine, endLine } = span.value;
    const { ctx, file } = session;

    const result = options.mode === 'comment'
      ? commentLines(ctx, file.buffer, startLine, endLine, { styleType })
      : options.mode === 'uncomment'
        ? uncommentLines(ctx, file.buffer, startLine, endLine)
        : toggleLines(ctx, file.buffer, startLine, endLine, { styleType });
    if (!result.ok) return report(reporter, result.error);

    const verb = result.value.action === 'comment' ? 'Commented' : 'Uncommented';
    return finish(session, common, reporter, `${verb} ${result.value.linesChanged} line(s) in ${path}`);
  });
}

// ─── normalize / align / convert ─────────────────────────────────────

export function runNormalize(
  path: string,
  rangeSpec: string | undefined,
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    const session = await openSession(path, common, reporter);
    const span = range(session, rangeSpec);
    if (!span.ok) return report(reporter, span.error);
    const result = normalizeRange(session.ctx, session.file.buffer, span.value.startLine, span.value.endLine);
    if (!result.ok) return report(reporter, result.error);
    return finish(session, common, reporter, `Normalized ${result.value} line(s) in ${path}`);
  });
}

export interface AlignCommandOptions {
  column?: number;
  minGap?: number;
  tabWidth?: number;
}

export function runAlign(
  path: string,
  rangeSpec: string | undefined,
  options: AlignCommandOptions,
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    const session = await openSession(path, common, reporter, { align: options });
    const span = range(session, rangeSpec);
    if (!span.ok) return report(reporter, span.error);
    const result = alignLines(session.ctx, session.file.buffer, span.value.startLine, span.value.endLine);
    if (!result.ok) return report(reporter, result.error);
    return finish(session, common, reporter, `Aligned ${result.value} line(s) in ${path}`);
  });
}

export type ConvertTarget = 'line' | 'block' | 'detect';

export function runConvert(
  path: string,
  target: string,
  rangeSpec: string | undefined,
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    if (target !== 'line' && target !== 'block' && target !== 'detect') {
      reporter.err(formatError({ kind: 'invalid-option', message: `Unknown conversion target "${target}"` }));
      return 1;
    }
    const session = await openSession(path, common, reporter);
    const span = range(session, rangeSpec);
    if (!span.ok) return report(reporter, span.error);
    const { startLine, endLine } = span.value;
    const { ctx, file } = session;

    if (target === 'detect') {
      const current = detectCurrentStyle(ctx, file.buffer, startLine, endLine);
      if (!current.ok) return report(reporter, current.error);
      reporter.out(current.value);
      return 0;
    }

    const convert = target === 'line' ? convertToLine : convertToBlock;
    const result = convert(ctx, file.buffer, startLine, endLine);
    if (!result.ok) return report(reporter, result.error);
    return finish(session, common, reporter, `Converted ${result.value} line(s) to ${target} comments in ${path}`);
  });
}

// ─── debug ───────────────────────────────────────────────────────────

export interface DebugCommandOptions {
  /** Toggle across a project directory instead of one file */
  project?: string;
  list?: boolean;
  /** Set false to skip the external search tool */
  searchTool?: boolean;
  startMarker?: string;
  endMarker?: string;
}

function debugFlags(options: DebugCommandOptions): QuillConfigInput {
  const flags: QuillConfigInput = {};
  if (options.startMarker !== undefined || options.endMarker !== undefined) {
    flags.debug = { startMarker: options.startMarker, endMarker: options.endMarker };
  }
  if (options.searchTool === false) flags.project = { useSearchTool: false };
  return flags;
}

async function runProjectDebug(
  dir: string,
  options: DebugCommandOptions,
  common: CommonOptions,
  reporter: Reporter,
): Promise<number> {
  const root = resolve(common.cwd ?? process.cwd(), dir);
  const { ctx } = loadContext(common, debugFlags(options), root);

  if (options.list) {
    const listing = await listProjectRegions(ctx, { root });
    for (const warning of listing.warnings) reporter.err(formatWarning(warning));
    for (const { file, reason } of listing.skipped) reporter.err(formatWarning(`${file}: ${reason}`));
    for (const { file, region } of listing.regions) reporter.out(`${file}:${region.line}: ${region.text}`);
    return 0;
  }

  const result = await toggleProjectRegions(ctx, { root, dryRun: common.dryRun });
  for (const warning of result.warnings) reporter.err(formatWarning(warning));
  for (const skipped of result.skipped) reporter.err(formatWarning(`${skipped.file}: ${skipped.reason}`));
  if (common.dryRun) {
    for (const change of result.changes) {
      for (const line of formatLineDiff(change.linesBefore, change.linesAfter, change.file)) reporter.out(line);
    }
  }
  const prefix = common.dryRun ? '(dry run) ' : '';
  reporter.err(formatSuccess(`${prefix}Toggled debug regions in ${result.toggled} of ${result.files} file(s)`));
  return 0;
}

export function runDebug(
  path: string | undefined,
  options: DebugCommandOptions,
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    if (options.project !== undefined) return runProjectDebug(options.project, options, common, reporter);
    if (path === undefined) {
      reporter.err(formatError({ kind: 'invalid-option', message: 'A file or --project <dir> is required' }));
      return 1;
    }

    const session = await openSession(path, common, reporter, debugFlags(options));
    const { ctx, file } = session;
    if (options.list) {
      const regions = listRegions(ctx, file.buffer);
      if (regions.length === 0) reporter.err(C.dim('No debug regions found'));
      for (const region of regions) reporter.out(`${path}:${region.line}: ${region.text}`);
      return 0;
    }

    const result = toggleBufferRegions(ctx, file.buffer);
    if (!result.ok) return report(reporter, result.error);
    const summary = result.value;
    for (const failure of summary.failures) reporter.err(formatWarning(failure.message));
    if (summary.regions === 0) {
      reporter.err(C.dim('No debug regions found'));
      return 0;
    }
    const verb = summary.action === 'comment' ? 'Commented' : 'Uncommented';
    return finish(session, common, reporter, `${verb} ${summary.toggled} of ${summary.regions} debug region(s) in ${path}`);
  });
}

// ─── inspect ─────────────────────────────────────────────────────────

export function runInspect(
  path: string,
  lineSpec: string,
  options: { col?: number },
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    const session = await openSession(path, common, reporter);
    const { ctx, file } = session;
    const line = parseLineNumber(lineSpec, file.buffer.lineCount());
    if (!line.ok) return report(reporter, line.error);
    const col = options.col ?? 0;
    const row = line.value - 1;

    reporter.out(`${C.bold('filetype')}   ${file.buffer.filetype || C.gray('(none)')}`);
    reporter.out(`${C.bold('style')}      ${formatStyle(getCommentStyle(ctx, file.buffer, row, col))}`);
    reporter.out(`${C.bold('commented')}  ${isCommented(ctx, file.buffer, line.value) ? 'yes' : 'no'}`);
    if (ctx.syntax?.isAvailable(file.buffer)) {
      reporter.out(`${C.bold('in comment')} ${isInCommentNode(ctx, file.buffer, row, col) ? 'yes' : 'no'}`);
      reporter.out(`${C.bold('in string')}  ${isInString(ctx.syntax, file.buffer, row, col) ? 'yes' : 'no'}`);
    }
    reporter.err(C.dim(`config: ${describeConfigSource(session.loaded)}`));
    return 0;
  });
}

// ─── select ──────────────────────────────────────────────────────────

export const SELECT_OBJECTS = [
  'inner-block', 'around-block', 'inner-line', 'around-line', 'function', 'expand',
] as const;
export type SelectObject = typeof SELECT_OBJECTS[number];

function isSelectObject(value: string): value is SelectObject {
  return SELECT_OBJECTS.some((object) => object === value);
}

export interface SelectCommandOptions {
  object: string;
  /** Last line of the range to expand (object `expand`) */
  end?: string;
}

function spanSelection(span: LineSpan): string {
  return `lines ${span.startLine}-${span.endLine}`;
}

export function runSelect(
  path: string,
  lineSpec: string,
  options: SelectCommandOptions,
  common: CommonOptions = {},
  reporter: Reporter = consoleReporter,
): Promise<number> {
  return guard(reporter, async () => {
    const object = options.object;
    if (!isSelectObject(object)) {
      reporter.err(formatError({
        kind: 'invalid-option',
        message: `Unknown text object "${object}" (expected one of ${SELECT_OBJECTS.join(', ')})`,
      }));
      return 1;
    }
    const session = await openSession(path, common, reporter);
    const { ctx, file } = session;
    const line = parseLineNumber(lineSpec, file.buffer.lineCount());
    if (!line.ok) return report(reporter, line.error);

    if (object === 'function' || object === 'expand') {
      let span: LineSpan | undefined;
      if (object === 'function') {
        span = findFunctionBounds(ctx, file.buffer, line.value);
      } else {
        const end = options.end === undefined ? line : parseLineNumber(options.end, file.buffer.lineCount());
        if (!end.ok) return report(reporter, end.error);
        span = expandSelection(ctx, file.buffer, line.value, Math.max(line.value, end.value));
      }
      if (!span) {
        reporter.err(C.dim('Nothing to select'));
        return 1;
      }
      reporter.out(spanSelection(span));
      return 0;
    }

    const selectors: Record<Exclude<SelectObject, 'function' | 'expand'>, typeof selectInnerBlock> = {
      'inner-block': selectInnerBlock,
      'around-block': selectAroundBlock,
      'inner-line': selectInnerLine,
      'around-line': selectAroundLine,
    };
    const selection: Selection | undefined = selectors[object](ctx, file.buffer, line.value);
    if (!selection) {
      reporter.err(C.dim('Nothing to select'));
      return 1;
    }
    reporter.out(formatSelection(selection));
    return 0;
  });
}
