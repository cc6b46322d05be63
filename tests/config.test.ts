import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import {
  describeConfigSource, globalConfigPath, loadConfig, mergeConfig, parseConfig, projectConfigPath,
} from '../src/config/load.js';
import { ConfigError } from '../src/util/errors.js';

describe('parseConfig', () => {
  it('fills every default', () => {
    const config = parseConfig({});
    expect(config.align).toEqual({ column: 80, minGap: 2, tabWidth: 8 });
    expect(config.debug).toEqual({ startMarker: '#region debug', endMarker: '#endregion' });
    expect(config.jsx.autoDetect).toBe(true);
    expect(config.semantic).toEqual({ includeDecorators: true, includeDocComments: true });
    expect(config.project.useSearchTool).toBe(true);
    expect(config.project.exclude).toContain('node_modules');
    expect(parseConfig(undefined)).toEqual(config);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ colour: 'red' })).toThrow(ConfigError);
    expect(() => parseConfig({ align: { width: 3 } })).toThrow(ConfigError);
  });

  it('names the field and file of a bad value', () => {
    try {
      parseConfig({ align: { column: 0 } }, 'settings.json');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.path).toBe('align.column');
        expect(err.source).toBe('settings.json');
        expect(err.message.startsWith('settings.json: align.column: ')).toBe(true);
      }
    }
  });
});

describe('mergeConfig', () => {
  it('merges objects and replaces everything else', () => {
    expect(mergeConfig({ a: { b: 1, c: [1] }, e: 'x' }, { a: { c: [2] }, d: null })).toEqual({
      a: { b: 1, c: [2] }, e: 'x', d: null,
    });
    expect(mergeConfig({ a: 1 }, undefined)).toEqual({ a: 1 });
    expect(mergeConfig('x', { a: 1 })).toEqual({ a: 1 });
  });
});

// ─── Layered loading ─────────────────────────────────────────────────

describe('loadConfig', () => {
  let base: string;
  let home: string;
  let root: string;

  async function writeJson(path: string, value: unknown): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(value));
  }

  beforeEach(async () => {
    base = await mkdtemp(join(tmpdir(), 'quill-config-'));
    home = join(base, 'home');
    root = join(base, 'project');
    await mkdir(home);
    await mkdir(root);
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it('uses the defaults when no file exists', () => {
    const loaded = loadConfig({ root, home, env: {} });
    expect(loaded.sources).toEqual([]);
    expect(loaded.config).toEqual(parseConfig({}));
    expect(describeConfigSource(loaded)).toBe('built-in defaults');
  });

  it('layers global, project, env file and flags', async () => {
    await writeJson(globalConfigPath(home), { align: { column: 100, minGap: 3 } });
    await writeJson(projectConfigPath(root), { align: { column: 60 } });
    await writeJson(join(root, 'custom.json'), { debug: { startMarker: 'BEGIN' } });

    const loaded = loadConfig({
      root, home, env: { QUILL_CONFIG: 'custom.json' }, flags: { align: { tabWidth: 4 } },
    });
    expect(loaded.config.align).toEqual({ column: 60, minGap: 3, tabWidth: 4 });
    expect(loaded.config.debug).toEqual({ startMarker: 'BEGIN', endMarker: '#endregion' });
    expect(loaded.sources).toEqual([globalConfigPath(home), projectConfigPath(root), join(root, 'custom.json')]);
    expect(describeConfigSource(loaded)).toBe(loaded.sources.join(' + '));
  });

  it('rejects a file that is not JSON', async () => {
    const path = projectConfigPath(root);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, '{ align: ');
    expect(() => loadConfig({ root, home, env: {} })).toThrow(`${path}: invalid JSON: `);
  });

  it('rejects a file with an invalid value before merging', async () => {
    await writeJson(globalConfigPath(home), { project: { maxFiles: -1 } });
    await writeJson(projectConfigPath(root), { project: { maxFiles: 10 } });
    expect(() => loadConfig({ root, home, env: {} })).toThrow(`${globalConfigPath(home)}: project.maxFiles: `);
  });

  it('requires the env file to exist', () => {
    expect(() => loadConfig({ root, home, env: { QUILL_CONFIG: 'nope.json' } }))
      .toThrow(`QUILL_CONFIG points at ${resolve(root, 'nope.json')}, which does not exist`);
  });
});
