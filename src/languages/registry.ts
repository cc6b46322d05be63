/**
 * Language registry: filetype id → comment style.
 *
 * Built from data/languages.json plus validated user overrides. Once
 * constructed the registry never changes; `resolve()` hands out copies so
 * callers cannot mutate the shared table.
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import type { CommentStyle } from '../types/index.js';
import {
  languageTableSchema, languageOverridesSchema, parseOrThrow,
  type LanguageTable, type LanguageOverride,
} from './schema.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface LanguageEntry {
  style: CommentStyle;
  extensions: readonly string[];
}

const BUILTIN_TABLE_URL = new URL('../../data/languages.json', import.meta.url);

let builtinTable: LanguageTable | null = null;

/** Load and validate the bundled language table (cached per process) */
export function loadBuiltinTable(): LanguageTable {
  if (!builtinTable) {
    const raw: unknown = JSON.parse(readFileSync(BUILTIN_TABLE_URL, 'utf-8'));
    builtinTable = parseOrThrow(languageTableSchema, raw, 'builtin');
  }
  return builtinTable;
}

function copyStyle(style: CommentStyle): CommentStyle {
  const copy: CommentStyle = {
    supportsNesting: style.supportsNesting,
    isJsxContext: style.isJsxContext,
  };
  if (style.line !== undefined) copy.line = style.line;
  if (style.block) copy.block = [style.block[0], style.block[1]];
  return copy;
}

/**
 * Merge an override onto a style: set fields replace, `null` removes a
 * form, omitted fields inherit. The base is not modified.
 */
export function mergeStyle(base: CommentStyle | undefined, override: LanguageOverride): CommentStyle {
  const style: CommentStyle = base ? copyStyle(base) : { supportsNesting: false, isJsxContext: false };

  if (override.line === null) delete style.line;
  else if (override.line !== undefined) style.line = override.line;

  if (override.block === null) delete style.block;
  else if (override.block !== undefined) style.block = override.block;

  if (override.supportsNesting !== undefined) style.supportsNesting = override.supportsNesting;
  if (override.isJsxContext !== undefined) style.isJsxContext = override.isJsxContext;

  return style;
}

function applyOverride(base: LanguageEntry | undefined, override: LanguageOverride): LanguageEntry {
  return {
    style: mergeStyle(base?.style, override),
    extensions: override.extensions ?? base?.extensions ?? [],
  };
}

// ─── Registry ────────────────────────────────────────────────────────

export class LanguageRegistry {
  private readonly entries: ReadonlyMap<string, LanguageEntry>;
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly byExtension: ReadonlyMap<string, string>;

  constructor(entries: Map<string, LanguageEntry>, aliases: Map<string, string>) {
    this.entries = entries;
    this.aliases = aliases;

    const byExtension = new Map<string, string>();
    for (const [id, entry] of entries) {
      for (const ext of entry.extensions) {
        if (!byExtension.has(ext)) byExtension.set(ext, id);
      }
    }
    this.byExtension = byExtension;
  }

  /** Build from a validated table */
  static fromTable(table: LanguageTable): LanguageRegistry {
    const entries = new Map<string, LanguageEntry>();
    for (const [id, data] of Object.entries(table.languages)) {
      const style: CommentStyle = {
        supportsNesting: data.supportsNesting,
        isJsxContext: data.isJsxContext,
      };
      if (data.line !== undefined) style.line = data.line;
      if (data.block) style.block = data.block;
      entries.set(id, { style, extensions: data.extensions });
    }
    return new LanguageRegistry(entries, new Map(Object.entries(table.aliases)));
  }

  /**
   * Return a new registry with `overrides` merged in. Each override is
   * validated first; a malformed entry throws ConfigError qualified with
   * `languages.<id>.<field>` and nothing is merged.
   */
  withOverrides(overrides: unknown): LanguageRegistry {
    const parsed = parseOrThrow(languageOverridesSchema, overrides ?? {}, 'languages');
    const entries = new Map(this.entries);
    for (const [id, override] of Object.entries(parsed)) {
      const canonical = this.canonicalId(id);
      entries.set(canonical, applyOverride(entries.get(canonical), override));
    }
    return new LanguageRegistry(entries, new Map(this.aliases));
  }

  canonicalId(languageId: string): string {
    return this.aliases.get(languageId) ?? languageId;
  }

  has(languageId: string): boolean {
    return this.entries.has(this.canonicalId(languageId));
  }

  /** Style for `languageId` after alias resolution; undefined when unknown */
  resolve(languageId: string | undefined): CommentStyle | undefined {
    if (!languageId) return undefined;
    const entry = this.entries.get(this.canonicalId(languageId));
    return entry ? copyStyle(entry.style) : undefined;
  }

  /** Infer a filetype from a path's extension */
  filetypeForPath(path: string): string | undefined {
    const ext = extname(path);
    if (!ext) return undefined;
    return this.byExtension.get(ext) ?? this.byExtension.get(ext.toLowerCase());
  }

  languageIds(): string[] {
    return [...this.entries.keys()].sort();
  }
}

/** Registry from the built-in table, with optional user overrides merged in */
export function createRegistry(overrides?: unknown): LanguageRegistry {
  const registry = LanguageRegistry.fromTable(loadBuiltinTable());
  return overrides === undefined ? registry : registry.withOverrides(overrides);
}
