/**
 * Result constructors and the one thrown error type.
 */

import type { QuillError, QuillErrorKind, Result } from '../types/index.js';

/** Raised while validating configuration or registry entries. */
export class ConfigError extends Error {
  /** Dotted field path, e.g. `languages.css.block`; empty for file-level problems */
  readonly path: string;
  readonly detail: string;
  /** File the bad value came from, when known */
  readonly source?: string;

  constructor(path: string, detail: string, source?: string) {
    const where = [source, path].filter(Boolean).join(': ');
    super(where ? `${where}: ${detail}` : detail);
    this.name = 'ConfigError';
    this.path = path;
    this.detail = detail;
    this.source = source;
  }
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: QuillErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function describeError(error: QuillError): string {
  return `${error.kind}: ${error.message}`;
}
