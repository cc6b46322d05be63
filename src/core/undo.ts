/**
 * Grouped mutations.
 *
 * `UndoHistory` records line edits and folds everything between the
 * outermost begin/end pair into one undo step. Nested begin/end pairs only
 * adjust the depth.
 */

import type { MutationGroup, Result } from '../types/index.js';
import { ok, fail } from '../util/errors.js';

// ─── Types ───────────────────────────────────────────────────────────

/** One `setLines` call, enough to reverse it */
export interface LineEdit {
  start: number;
  before: string[];
  after: string[];
}

// ─── History ─────────────────────────────────────────────────────────

export class UndoHistory implements MutationGroup {
  private depth = 0;
  private pending: LineEdit[] | null = null;
  private readonly groups: LineEdit[][] = [];
  private readonly warningLog: string[] = [];

  begin(): void {
    if (this.depth === 0) this.pending = [];
    this.depth++;
  }

  end(): void {
    if (this.depth === 0) {
      this.warningLog.push('end() called without a matching begin()');
      return;
    }
    this.depth--;
    if (this.depth === 0 && this.pending) {
      if (this.pending.length > 0) this.groups.push(this.pending);
      this.pending = null;
    }
  }

  /** Record an edit; outside a group it becomes its own undo step */
  record(edit: LineEdit): void {
    if (this.pending) this.pending.push(edit);
    else this.groups.push([edit]);
  }

  /** Remove and return the most recent complete group */
  pop(): LineEdit[] | undefined {
    return this.groups.pop();
  }

  get inGroup(): boolean {
    return this.depth > 0;
  }

  get level(): number {
    return this.depth;
  }

  /** Number of complete undo steps */
  get size(): number {
    return this.groups.length;
  }

  get warnings(): readonly string[] {
    return this.warningLog;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

/** Run `fn` between begin/end; the group is closed even if `fn` throws */
export function withUndoGroup<T>(group: MutationGroup, fn: () => T): T {
  group.begin();
  try {
    return fn();
  } finally {
    group.end();
  }
}

/**
 * Run `apply` as one grouped mutation, reporting a throwing host buffer
 * as a collaborator failure prefixed with `context`.
 */
export function runGrouped<T>(group: MutationGroup, context: string, apply: () => T): Result<T> {
  try {
    return ok(withUndoGroup(group, apply));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail('collaborator', `${context}: ${message}`);
  }
}
