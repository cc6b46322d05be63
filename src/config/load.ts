/**
 * Quill configuration resolution.
 *
 * Layers, highest priority first:
 *   1. Explicit flags (CLI only, never persisted)
 *   2. File named by the QUILL_CONFIG env var
 *   3. Project config: <root>/.quill/config.json
 *   4. Global config: ~/.config/quill/config.json
 *   5. Built-in defaults
 *
 * Each file is validated on its own so errors name the file they came
 * from; the layers are then merged and validated once more.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { ConfigError } from '../util/errors.js';
import { parseOrThrow } from '../languages/schema.js';
import { quillConfigSchema, type QuillConfig, type QuillConfigInput } from './schema.js';

export const CONFIG_ENV_VAR = 'QUILL_CONFIG';
const CONFIG_FILE = 'config.json';

// ─── Config file paths ───────────────────────────────────────────────

/** Project-level config: <root>/.quill/config.json */
export function projectConfigPath(root: string): string {
  return join(root, '.quill', CONFIG_FILE);
}

/** Global config: ~/.config/quill/config.json */
export function globalConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'quill', CONFIG_FILE);
}

// ─── Parsing ─────────────────────────────────────────────────────────

/** Validate a config value and fill defaults. Throws ConfigError. */
export function parseConfig(input: unknown, source?: string): QuillConfig {
  try {
    return parseOrThrow(quillConfigSchema, input ?? {}, '');
  } catch (err) {
    if (err instanceof ConfigError && source) {
      throw new ConfigError(err.path, err.detail, source);
    }
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge two raw config layers. Objects merge key by key; arrays,
 * scalars and `null` from `override` replace what `base` had.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = key in base ? mergeConfig(base[key], value) : value;
  }
  return merged;
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError('', `cannot read file: ${message}`, path);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError('', `invalid JSON: ${message}`, path);
  }
}

// ─── Unified resolution ──────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Project root holding .quill/config.json */
  root: string;
  /** Highest-priority overrides, e.g. from CLI flags */
  flags?: QuillConfigInput;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export interface LoadedConfig {
  config: QuillConfig;
  /** Files that contributed, lowest priority first */
  sources: string[];
}

/**
 * Resolve configuration through the layer chain. A file that exists but
 * does not parse or validate aborts with ConfigError; a file named by
 * QUILL_CONFIG must exist.
 */
export function loadConfig(options: LoadConfigOptions): LoadedConfig {
  const env = options.env ?? process.env;
  const sources: string[] = [];
  let merged: unknown = {};

  const candidates: string[] = [
    globalConfigPath(options.home),
    projectConfigPath(options.root),
  ];
  const envPath = env[CONFIG_ENV_VAR];
  if (envPath) {
    const full = resolve(options.root, envPath);
    if (!existsSync(full)) {
      throw new ConfigError('', `${CONFIG_ENV_VAR} points at ${full}, which does not exist`);
    }
    candidates.push(full);
  }

  for (const path of candidates) {
    if (!existsSync(path)) continue;
    const raw = readConfigFile(path);
    parseConfig(raw, path);
    merged = mergeConfig(merged, raw);
    sources.push(path);
  }

  if (options.flags) merged = mergeConfig(merged, options.flags);

  return { config: parseConfig(merged), sources };
}

/** Human-readable description of where configuration came from */
export function describeConfigSource(loaded: LoadedConfig): string {
  if (loaded.sources.length === 0) return 'built-in defaults';
  return loaded.sources.join(' + ');
}
