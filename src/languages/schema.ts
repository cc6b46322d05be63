/**
 * Zod schemas for language entries.
 * The built-in table and user overrides are validated by the same marker
 * rules, so a malformed block pair fails the same way wherever it comes from.
 */

import { z } from 'zod';
import type { BlockPair } from '../types/index.js';
import { ConfigError } from '../util/errors.js';

// ─── Markers ─────────────────────────────────────────────────────────

export const markerSchema = z.string().min(1, 'marker must be a non-empty string');

export const blockPairSchema = z
  .array(markerSchema, { invalid_type_error: 'expected exactly two non-empty marker strings' })
  .length(2, 'expected exactly two non-empty marker strings')
  .transform((pair): BlockPair => [pair[0], pair[1]]);

// ─── Entries ─────────────────────────────────────────────────────────

export const languageEntrySchema = z.object({
  line: markerSchema.optional(),
  block: blockPairSchema.optional(),
  supportsNesting: z.boolean().default(false),
  isJsxContext: z.boolean().default(false),
  extensions: z.array(z.string().min(1)).default([]),
}).strict();

/** Omitted fields inherit the built-in entry; `null` removes a form. */
export const languageOverrideSchema = z.object({
  line: markerSchema.nullable().optional(),
  block: blockPairSchema.nullable().optional(),
  supportsNesting: z.boolean().optional(),
  isJsxContext: z.boolean().optional(),
  extensions: z.array(z.string().min(1)).optional(),
}).strict();

export const languageTableSchema = z.object({
  aliases: z.record(z.string().min(1)).default({}),
  languages: z.record(languageEntrySchema),
}).strict();

export const languageOverridesSchema = z.record(languageOverrideSchema);

export type LanguageEntryData = z.infer<typeof languageEntrySchema>;
export type LanguageOverride = z.infer<typeof languageOverrideSchema>;
export type LanguageOverrideInput = z.input<typeof languageOverrideSchema>;
export type LanguageTable = z.infer<typeof languageTableSchema>;

// ─── Error formatting ────────────────────────────────────────────────

/**
 * Convert the first zod issue into a ConfigError whose path is qualified
 * from `prefix` (e.g. `languages.css.block`).
 */
export function toConfigError(error: z.ZodError, prefix: string): ConfigError {
  const issue = error.issues[0];
  if (!issue) return new ConfigError(prefix, 'invalid value');
  const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
  return new ConfigError(path, issue.message);
}

/** Parse with `schema`, throwing a path-qualified ConfigError on failure */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, prefix: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw toConfigError(parsed.error, prefix);
  return parsed.data;
}
