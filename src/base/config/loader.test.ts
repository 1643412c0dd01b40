/**
 * Config Loader Tests
 */

import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { loadConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';
import { ConfigError } from '../utils/errors.js';
import { createTestTree, writeFiles } from '../../../tests/helpers/plugin-tree.js';

describe('loadConfig', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTestTree('plugdoc-config-'));
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should fall back to defaults without a config file', async () => {
    const { config, sources } = await loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual({ ...DEFAULT_CONFIG, root: path.join(dir, 'plugins') });
    expect(sources).toEqual([{ type: 'defaults' }]);
  });

  it('should read plugdoc.json from the working directory', async () => {
    await writeFiles(dir, {
      'plugdoc.json': JSON.stringify({ root: 'docs/plugins', duplicatePolicy: 'last-wins', readConcurrency: 4 }),
    });

    const { config, sources } = await loadConfig({ cwd: dir, env: {} });

    expect(config.root).toBe(path.join(dir, 'docs/plugins'));
    expect(config.duplicatePolicy).toBe('last-wins');
    expect(config.readConcurrency).toBe(4);
    expect(config.ignore).toEqual(DEFAULT_CONFIG.ignore);
    expect(sources).toEqual([{ type: 'defaults' }, { type: 'file', path: path.join(dir, 'plugdoc.json') }]);
  });

  it('should resolve a file root relative to the config file', async () => {
    await writeFiles(dir, { 'conf/plugdoc.json': JSON.stringify({ root: '../shared' }) });

    const { config } = await loadConfig({ cwd: dir, configPath: 'conf/plugdoc.json', env: {} });

    expect(config.root).toBe(path.join(dir, 'shared'));
  });

  it('should fail when an explicit config file is missing', async () => {
    await expect(loadConfig({ cwd: dir, configPath: 'absent.json', env: {} })).rejects.toThrow(ConfigError);
    await expect(loadConfig({ cwd: dir, env: { PLUGDOC_CONFIG: 'absent.json' } })).rejects.toThrow(
      'Cannot read config file'
    );
  });

  it('should reject invalid JSON', async () => {
    await writeFiles(dir, { 'plugdoc.json': '{ "root": ' });

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow('Invalid JSON in config file');
  });

  it('should reject settings that fail validation', async () => {
    await writeFiles(dir, { 'plugdoc.json': JSON.stringify({ duplicatePolicy: 'first-wins' }) });

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow('Invalid config file: duplicatePolicy');
  });

  it('should let the environment override the file', async () => {
    await writeFiles(dir, { 'plugdoc.json': JSON.stringify({ root: 'from-file' }) });

    const { config, sources } = await loadConfig({
      cwd: dir,
      env: { PLUGDOC_ROOT: 'from-env', PLUGDOC_DUPLICATE_POLICY: 'last-wins' },
    });

    expect(config.root).toBe(path.join(dir, 'from-env'));
    expect(config.duplicatePolicy).toBe('last-wins');
    expect(sources.map((source) => source.type)).toEqual(['defaults', 'file', 'env']);
  });

  it('should reject an unknown duplicate policy in the environment', async () => {
    await expect(loadConfig({ cwd: dir, env: { PLUGDOC_DUPLICATE_POLICY: 'newest' } })).rejects.toThrow(
      'PLUGDOC_DUPLICATE_POLICY must be "error" or "last-wins", got "newest"'
    );
  });

  it('should let CLI overrides win', async () => {
    const { config, sources } = await loadConfig({
      cwd: dir,
      env: { PLUGDOC_ROOT: 'from-env' },
      overrides: { root: 'from-cli' },
    });

    expect(config.root).toBe(path.join(dir, 'from-cli'));
    expect(sources.map((source) => source.type)).toEqual(['defaults', 'env', 'cli']);
  });
});
