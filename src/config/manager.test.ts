/**
 * Tests for ConfigManager file handling
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigManager } from './manager.js';
import { join } from 'path';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pagetab-test-'));
    configPath = join(tempDir, 'nested', 'config.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reports the resolved path and directory', () => {
    const manager = new ConfigManager(configPath);
    expect(manager.getConfigPath()).toBe(configPath);
    expect(manager.getConfigDir()).toBe(join(tempDir, 'nested'));
  });

  it('creates a default config on init', async () => {
    const manager = new ConfigManager(configPath);

    expect(await manager.init()).toEqual({ created: true, path: configPath });
    expect(JSON.parse(await readFile(configPath, 'utf-8'))).toEqual(DEFAULT_CONFIG);
    expect(await manager.init()).toEqual({ created: false, path: configPath });
    expect(await manager.init(true)).toEqual({ created: true, path: configPath });
  });

  it('fails to load a missing file', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.load()).rejects.toThrow(`Config file not found: ${configPath}`);
  });

  it('uses defaults when there is no file', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const manager = new ConfigManager(configPath);

    expect(await manager.loadOrDefault()).toEqual(DEFAULT_CONFIG);
    expect(write).not.toHaveBeenCalled();
  });

  it('warns and uses defaults for an invalid file', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const path = join(tempDir, 'config.json');
    await writeFile(path, '{"version": 3}');

    const config = await new ConfigManager(path).loadOrDefault();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toContain(
      '[WARN] [config] Invalid config: version: version must be 1; using defaults'
    );
  });

  it('refuses to save an invalid config', async () => {
    const manager = new ConfigManager(configPath);
    const bad = { ...DEFAULT_CONFIG, terminal: { width: -1, height: 25 } };
    await expect(manager.save(bad)).rejects.toThrow('Invalid config: terminal.width: width must be a positive integer');
  });

  it('validates the file on disk', async () => {
    const path = join(tempDir, 'config.json');
    const manager = new ConfigManager(path);

    expect(await manager.validate()).toEqual({
      valid: false,
      errors: [{ path: '', message: 'Config file not found' }],
    });

    await writeFile(path, '{"version": 1, "paging": "no"}');
    expect(await manager.validate()).toEqual({
      valid: false,
      errors: [{ path: 'paging', message: 'paging must be a boolean' }],
    });
  });
});
