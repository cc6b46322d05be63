/**
 * In-memory TextBuffer with undo, used by the CLI and by tests.
 */

import type { TextBuffer } from '../types/index.js';
import { UndoHistory } from './undo.js';

export interface MemoryBufferOptions {
  filetype?: string;
  commentTemplate?: string;
}

export class MemoryBuffer implements TextBuffer {
  readonly filetype: string;
  readonly commentTemplate?: string;
  readonly history = new UndoHistory();
  private lines: string[];
  private dirty = false;
  private tick = 0;

  constructor(lines: readonly string[], options: MemoryBufferOptions = {}) {
    this.lines = lines.length > 0 ? [...lines] : [''];
    this.filetype = options.filetype ?? '';
    this.commentTemplate = options.commentTemplate;
  }

  static fromText(text: string, options: MemoryBufferOptions = {}): MemoryBuffer {
    return new MemoryBuffer(text.split(/\r?\n/), options);
  }

  lineCount(): number {
    return this.lines.length;
  }

  getLines(start: number, end: number): string[] {
    return this.lines.slice(start, end);
  }

  setLines(start: number, end: number, replacement: readonly string[]): void {
    if (start < 0 || end < start || end > this.lines.length) {
      throw new RangeError(`setLines: range [${start}, ${end}) is outside 0..${this.lines.length}`);
    }
    const before = this.lines.slice(start, end);
    const after = [...replacement];
    this.lines.splice(start, end - start, ...after);
    this.history.record({ start, before, after });
    this.dirty = true;
    this.tick++;
  }

  changeTick(): number {
    return this.tick;
  }

  /** Snapshot of every line */
  allLines(): string[] {
    return [...this.lines];
  }

  getText(): string {
    return this.lines.join('\n');
  }

  get modified(): boolean {
    return this.dirty;
  }

  markSaved(): void {
    this.dirty = false;
  }

  /** Revert the last complete undo group; false when there is nothing to undo */
  undo(): boolean {
    const group = this.history.pop();
    if (!group) return false;
    for (const edit of [...group].reverse()) {
      this.lines.splice(edit.start, edit.after.length, ...edit.before);
    }
    this.dirty = true;
    this.tick++;
    return true;
  }
}
