/**
 * Text files as MemoryBuffers. Line endings and the trailing newline are
 * remembered so a save writes the file back in its own format.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { MemoryBuffer } from '../core/buffer.js';
import type { LanguageRegistry } from '../languages/registry.js';

export interface TextFile {
  path: string;
  buffer: MemoryBuffer;
  eol: '\n' | '\r\n';
  finalNewline: boolean;
}

export function bufferFromText(
  text: string,
  path: string,
  registry: LanguageRegistry,
  filetype?: string,
): TextFile {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  const finalNewline = text.endsWith('\n');
  const body = finalNewline ? text.slice(0, text.endsWith('\r\n') ? -2 : -1) : text;
  const buffer = MemoryBuffer.fromText(body, {
    filetype: filetype ?? registry.filetypeForPath(path) ?? '',
  });
  return { path, buffer, eol, finalNewline };
}

export async function loadTextFile(path: string, registry: LanguageRegistry, filetype?: string): Promise<TextFile> {
  const text = await readFile(path, 'utf-8');
  return bufferFromText(text, path, registry, filetype);
}

export function renderTextFile(file: TextFile): string {
  const body = file.buffer.allLines().join(file.eol);
  return file.finalNewline ? body + file.eol : body;
}

export async function saveTextFile(file: TextFile): Promise<void> {
  await writeFile(file.path, renderTextFile(file), 'utf-8');
  file.buffer.markSaved();
}
