/**
 * Project-wide debug-region listing and toggling. Files are handled one at a
 * time; a file that cannot be processed is skipped with a reason and the
 * batch continues.
 */

import { readFile, stat, writeFile } from 'node:fs/promises';
import { relative, resolve } from 'node:path';
import type { QuillContext } from '../core/context.js';
import { listRegions, toggleBufferRegions, type RegionListing } from '../features/debug.js';
import { describeError } from '../util/errors.js';
import { bufferFromText, renderTextFile } from './files.js';
import { scanProject, type SearchTool } from './search.js';

export interface ProjectScanOptions {
  root: string;
  /** Search tool to try first (default ripgrep); `null` uses the filesystem walk only */
  searchTool?: SearchTool | null;
}

export interface ProjectToggleOptions extends ProjectScanOptions {
  /** Compute the changes without writing them */
  dryRun?: boolean;
}

export interface FileToggle {
  /** Relative to the project root */
  file: string;
  action: 'comment' | 'uncomment';
  regions: number;
  linesBefore: string[];
  linesAfter: string[];
}

export interface ProjectToggleReport {
  /** Files whose regions were toggled (or would be, in a dry run) */
  toggled: number;
  /** Files that contained a start marker */
  files: number;
  changes: FileToggle[];
  skipped: Array<{ file: string; reason: string }>;
  warnings: string[];
}

export interface ProjectRegion {
  /** Relative to the project root */
  file: string;
  path: string;
  region: RegionListing;
}

export interface ProjectListReport {
  /** Files that contained a start marker */
  files: number;
  regions: ProjectRegion[];
  skipped: Array<{ file: string; reason: string }>;
  warnings: string[];
}

type FileRead = { ok: true; text: string; mtimeMs: number } | { ok: false; reason: string };

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function readProjectFile(path: string, maxFileBytes: number): Promise<FileRead> {
  try {
    const info = await stat(path);
    if (info.size > maxFileBytes) return { ok: false, reason: `larger than ${maxFileBytes} bytes` };
    const text = await readFile(path, 'utf-8');
    return { ok: true, text, mtimeMs: info.mtimeMs };
  } catch (err) {
    return { ok: false, reason: `unreadable: ${message(err)}` };
  }
}

export async function listProjectRegions(
  ctx: QuillContext,
  options: ProjectScanOptions,
): Promise<ProjectListReport> {
  const root = resolve(options.root);
  const { project, debug } = ctx.config;
  const scan = await scanProject(root, debug.startMarker, project, options.searchTool);
  const report: ProjectListReport = {
    files: scan.files.length,
    regions: [],
    skipped: [],
    warnings: [...scan.warnings],
  };

  for (const path of scan.files) {
    const file = relative(root, path);
    const read = await readProjectFile(path, project.maxFileBytes);
    if (!read.ok) {
      report.skipped.push({ file, reason: read.reason });
      continue;
    }
    const textFile = bufferFromText(read.text, path, ctx.registry);
    for (const region of listRegions(ctx, textFile.buffer)) report.regions.push({ file, path, region });
  }

  return report;
}

export async function toggleProjectRegions(
  ctx: QuillContext,
  options: ProjectToggleOptions,
): Promise<ProjectToggleReport> {
  const root = resolve(options.root);
  const { project, debug } = ctx.config;
  const scan = await scanProject(root, debug.startMarker, project, options.searchTool);
  const report: ProjectToggleReport = {
    toggled: 0,
    files: scan.files.length,
    changes: [],
    skipped: [],
    warnings: [...scan.warnings],
  };

  for (const path of scan.files) {
    const file = relative(root, path);
    const read = await readProjectFile(path, project.maxFileBytes);
    if (!read.ok) {
      report.skipped.push({ file, reason: read.reason });
      continue;
    }

    const textFile = bufferFromText(read.text, path, ctx.registry);
    const before = textFile.buffer.allLines();
    const result = toggleBufferRegions(ctx, textFile.buffer);
    if (!result.ok) {
      report.skipped.push({ file, reason: describeError(result.error) });
      continue;
    }
    const summary = result.value;
    for (const failure of summary.failures) report.warnings.push(`${file}: ${describeError(failure)}`);
    if (summary.regions === 0 || !textFile.buffer.modified) continue;

    if (!options.dryRun) {
      try {
        const current = await stat(path);
        if (current.mtimeMs !== read.mtimeMs) {
          report.skipped.push({ file, reason: 'modified on disk while processing' });
          continue;
        }
        await writeFile(path, renderTextFile(textFile), 'utf-8');
      } catch (err) {
        report.warnings.push(`${file}: write failed: ${message(err)}`);
        continue;
      }
    }

    report.toggled++;
    report.changes.push({
      file,
      action: summary.action,
      regions: summary.regions,
      linesBefore: before,
      linesAfter: textFile.buffer.allLines(),
    });
  }

  return report;
}
