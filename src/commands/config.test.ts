/**
 * Tests for config commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { createConfigCommand } from './config.js';
import { setOutputOptions } from '../utils/output.js';

describe('config command', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pagetab-test-'));
    configPath = join(tempDir, 'config.json');
    setOutputOptions({ json: false, verbose: false });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  const run = (args: string[]) => createConfigCommand(() => configPath).parseAsync(args, { from: 'user' });

  it('prints the config path', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run(['path']);
    expect(log).toHaveBeenCalledWith(configPath);
  });

  it('creates the config once', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await run(['init']);
    expect(log).toHaveBeenLastCalledWith(`✓ Config created at: ${configPath}`);
    expect(JSON.parse(await readFile(configPath, 'utf-8'))).toMatchObject({ version: 1, paging: true });

    await run(['init']);
    expect(log).toHaveBeenLastCalledWith(`Config already exists at: ${configPath}\nUse --force to overwrite.`);
  });

  it('shows the settings in effect', async () => {
    await writeFile(configPath, '{"version": 1, "wrap": false}');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await run(['show']);

    const expected = { version: 1, paging: true, wrap: false, terminal: { width: 80, height: 25 } };
    expect(log).toHaveBeenCalledWith(JSON.stringify(expected, null, 2));
  });

  it('exits with status 1 for an invalid config', async () => {
    await writeFile(configPath, '{"version": 2}');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    await expect(run(['validate'])).rejects.toThrow('exit 1');
    expect(log).toHaveBeenCalledWith('Config validation failed:\n  - version: version must be 1');
  });
});
