/**
 * Project scan for debug-region markers: an external search tool when one
 * is usable, otherwise a capped fast-glob walk.
 */

import fg from 'fast-glob';
import { spawnSync } from 'node:child_process';
import { readFile, stat } from 'node:fs/promises';
import { relative, resolve, sep } from 'node:path';
import type { ProjectConfig } from '../config/schema.js';

export interface SearchMatch {
  /** Absolute path */
  file: string;
  /** 1-indexed */
  line: number;
  text: string;
}

export type SearchOutcome =
  | { status: 'matches'; matches: SearchMatch[] }
  | { status: 'no-matches' }
  | { status: 'failed'; reason: string };

/** Literal-pattern search over a directory tree */
export interface SearchTool {
  readonly name: string;
  search(pattern: string, cwd: string): SearchOutcome;
}

export interface ScanResult {
  /** Files with at least one match, sorted */
  files: string[];
  matches: SearchMatch[];
  warnings: string[];
  /** `walk` or the search tool's name */
  via: string;
}

// ─── ripgrep ─────────────────────────────────────────────────────────

const RG_LINE = /^(.+?):(\d+):(.*)$/;

export function parseSearchOutput(output: string, cwd: string): SearchMatch[] {
  const matches: SearchMatch[] = [];
  for (const raw of output.split(/\r?\n/)) {
    const m = raw.match(RG_LINE);
    if (!m) continue;
    matches.push({ file: resolve(cwd, m[1]), line: Number(m[2]), text: m[3] });
  }
  return matches;
}

export const ripgrep: SearchTool = {
  name: 'rg',
  search(pattern, cwd) {
    const result = spawnSync('rg', ['--line-number', '--no-heading', '--fixed-strings', '--', pattern, '.'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    });
    if (result.error) return { status: 'failed', reason: result.error.message };
    if (result.status === 1) return { status: 'no-matches' };
    if (result.status !== 0) {
      const stderr = result.stderr.trim();
      return { status: 'failed', reason: stderr || `exited with status ${String(result.status)}` };
    }
    return { status: 'matches', matches: parseSearchOutput(result.stdout, cwd) };
  },
};

// ─── Filesystem walk ─────────────────────────────────────────────────

function isExcluded(file: string, root: string, exclude: readonly string[]): boolean {
  const segments = relative(root, file).split(sep);
  return segments.some((segment) => exclude.includes(segment));
}

/**
 * Read every file under `root` (excluded directories skipped) and collect
 * lines containing `pattern`. Gives up with a warning past `maxFiles`;
 * skips files over `maxFileBytes` and files containing NUL bytes.
 */
export async function walkForPattern(
  root: string,
  pattern: string,
  config: ProjectConfig,
): Promise<{ matches: SearchMatch[]; warnings: string[] }> {
  const warnings: string[] = [];
  const files = await fg('**/*', {
    cwd: root,
    ignore: config.exclude.map((dir) => `**/${dir}/**`),
    absolute: true,
    dot: true,
    onlyFiles: true,
  });

  if (files.length > config.maxFiles) {
    warnings.push(`Project has more than ${config.maxFiles} files; scan skipped`);
    return { matches: [], warnings };
  }

  const matches: SearchMatch[] = [];
  for (const file of files.sort()) {
    let content: Buffer;
    try {
      const info = await stat(file);
      if (info.size > config.maxFileBytes) {
        warnings.push(`${relative(root, file)}: larger than ${config.maxFileBytes} bytes, skipped`);
        continue;
      }
      content = await readFile(file);
    } catch (err) {
      warnings.push(`${relative(root, file)}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    if (content.includes(0)) continue;

    content.toString('utf-8').split(/\r?\n/).forEach((text, index) => {
      if (text.includes(pattern)) matches.push({ file: resolve(file), line: index + 1, text });
    });
  }
  return { matches, warnings };
}

// ─── Scan ────────────────────────────────────────────────────────────

function summarize(matches: SearchMatch[], warnings: string[], via: string): ScanResult {
  const files = [...new Set(matches.map((m) => m.file))].sort();
  return { files, matches, warnings, via };
}

/**
 * Find files under `root` containing `pattern`. `tool` is tried first
 * when `config.useSearchTool` is set; a failed tool falls back to the walk.
 */
export async function scanProject(
  root: string,
  pattern: string,
  config: ProjectConfig,
  tool: SearchTool | null = ripgrep,
): Promise<ScanResult> {
  const warnings: string[] = [];
  const absRoot = resolve(root);

  if (config.useSearchTool && tool) {
    const outcome = tool.search(pattern, absRoot);
    if (outcome.status === 'no-matches') return summarize([], warnings, tool.name);
    if (outcome.status === 'matches') {
      const kept = outcome.matches.filter((m) => !isExcluded(m.file, absRoot, config.exclude));
      return summarize(kept, warnings, tool.name);
    }
    warnings.push(`${tool.name} failed (${outcome.reason}); falling back to a filesystem walk`);
  }

  const walked = await walkForPattern(absRoot, pattern, config);
  return summarize(walked.matches, [...warnings, ...walked.warnings], 'walk');
}
