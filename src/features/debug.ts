/**
 * Debug regions: spans delimited by marker lines (by default
 * `#region debug` … `#endregion`) that are commented or uncommented as a
 * unit. Markers match as plain substrings, so they work inside any
 * language's comment syntax.
 */

import type { DebugRegion, LineSpan, QuillError, Result, TextBuffer } from '../types/index.js';
import type { DebugConfig } from '../config/schema.js';
import { ok } from '../util/errors.js';
import type { QuillContext } from '../core/context.js';
import { analyzeLines, toggleLines } from '../core/toggle.js';
import { runGrouped } from '../core/undo.js';

// ─── Scanning ────────────────────────────────────────────────────────

/**
 * Pair start and end markers in `lines`. A start marker followed by
 * another start before any end marker is dropped and the later one opens
 * the region; an end marker with no open start is ignored.
 */
export function scanRegionSpans(lines: readonly string[], markers: DebugConfig): LineSpan[] {
  const spans: LineSpan[] = [];
  let open: number | null = null;

  lines.forEach((line, index) => {
    const lineNo = index + 1;
    if (line.includes(markers.startMarker)) {
      open = lineNo;
    } else if (line.includes(markers.endMarker) && open !== null) {
      spans.push({ startLine: open, endLine: lineNo });
      open = null;
    }
  });

  return spans;
}

/**
 * A region counts as commented when its content lines are all or partly
 * commented. A region with no content lines is not.
 */
export function isRegionCommented(
  ctx: QuillContext,
  buffer: TextBuffer,
  startLine: number,
  endLine: number,
): boolean {
  if (endLine - startLine <= 1) return false;
  const state = analyzeLines(ctx, buffer, startLine + 1, endLine - 1);
  return state.ok && state.value !== 'noneCommented';
}

export function findDebugRegions(ctx: QuillContext, buffer: TextBuffer): DebugRegion[] {
  const lines = buffer.getLines(0, buffer.lineCount());
  return scanRegionSpans(lines, ctx.config.debug).map((span) => ({
    ...span,
    isCommented: isRegionCommented(ctx, buffer, span.startLine, span.endLine),
  }));
}

// ─── Toggling ────────────────────────────────────────────────────────

/**
 * Flip one region's content lines (marker lines stay as they are): a
 * commented region is uncommented, otherwise commented. Returns the number
 * of changed lines.
 */
export function toggleRegion(ctx: QuillContext, buffer: TextBuffer, region: DebugRegion): Result<number> {
  const first = region.startLine + 1;
  const last = region.endLine - 1;
  if (last < first) return ok(0);

  const toggled = toggleLines(ctx, buffer, first, last, {
    forceComment: !region.isCommented,
    forceUncomment: region.isCommented,
  });
  return toggled.ok ? ok(toggled.value.linesChanged) : toggled;
}

export interface BufferToggleSummary {
  action: 'comment' | 'uncomment';
  regions: number;
  toggled: number;
  failures: QuillError[];
}

/**
 * Toggle every region in the buffer the same way, decided by majority:
 * if at least half are commented, all are uncommented. Runs as one
 * mutation group.
 */
export function toggleBufferRegions(ctx: QuillContext, buffer: TextBuffer): Result<BufferToggleSummary> {
  const regions = findDebugRegions(ctx, buffer);
  const commented = regions.filter((r) => r.isCommented).length;
  const shouldUncomment = regions.length > 0 && commented >= regions.length / 2;
  const summary: BufferToggleSummary = {
    action: shouldUncomment ? 'uncomment' : 'comment',
    regions: regions.length,
    toggled: 0,
    failures: [],
  };
  if (regions.length === 0) return ok(summary);

  // Bottom-up, so unwrapping a block-wrapped region cannot shift the
  // line numbers of regions still to come.
  const ordered = [...regions].reverse();
  const written = runGrouped(buffer.history, 'Failed to toggle debug regions', () => {
    for (const region of ordered) {
      const res = toggleRegion(ctx, buffer, { ...region, isCommented: shouldUncomment });
      if (res.ok) summary.toggled++;
      else summary.failures.push(res.error);
    }
  });
  return written.ok ? ok(summary) : written;
}

// ─── Listing ─────────────────────────────────────────────────────────

export interface RegionListing {
  line: number;
  endLine: number;
  isCommented: boolean;
  text: string;
}

export function formatRegion(region: DebugRegion): string {
  const state = region.isCommented ? '[commented]' : '[active]';
  return `Debug region ${state} (lines ${region.startLine}-${region.endLine})`;
}

export function listRegions(ctx: QuillContext, buffer: TextBuffer): RegionListing[] {
  return findDebugRegions(ctx, buffer).map((region) => ({
    line: region.startLine,
    endLine: region.endLine,
    isCommented: region.isCommented,
    text: formatRegion(region),
  }));
}
