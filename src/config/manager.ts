/**
 * Config manager - handles reading and writing the config file
 */

import type { Config } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { atomicWriteFile, readFileSafe, fileExists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { formatValidationErrors, parseConfig, validateConfig } from './schema.js';
import type { ValidationResult } from './schema.js';
import { dirname } from 'path';

function defaultConfig(): Config {
  return { ...DEFAULT_CONFIG, terminal: { ...DEFAULT_CONFIG.terminal } };
}

export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;
  /** In-flight disk read shared by concurrent load() calls */
  private loading: Promise<Config> | null = null;
  /** Cache TTL in milliseconds (default: 5 seconds) */
  private cacheTtlMs: number;
  /** Timestamp when cache was last updated */
  private cacheUpdatedAt: number = 0;

  constructor(configPath?: string, options?: { cacheTtlMs?: number }) {
    this.configPath = resolveConfigPath({ configPath });
    this.cacheTtlMs = options?.cacheTtlMs ?? 5000;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return dirname(this.configPath);
  }

  async exists(): Promise<boolean> {
    return fileExists(this.configPath);
  }

  async load(): Promise<Config> {
    // Return cached config if still valid
    if (this.config && Date.now() - this.cacheUpdatedAt < this.cacheTtlMs) {
      return this.config;
    }

    if (!this.loading) {
      this.loading = this.loadFromDisk().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async loadFromDisk(): Promise<Config> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      throw new Error(`Config file not found: ${this.configPath}`);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new Error(`Invalid config: ${formatValidationErrors(errors)}`);
    }

    this.config = config;
    this.cacheUpdatedAt = Date.now();
    return config;
  }

  /**
   * Invalidate the config cache (force reload on next access)
   */
  invalidateCache(): void {
    this.cacheUpdatedAt = 0;
  }

  /**
   * Load the config, or the defaults when there is no usable file.
   * A file that exists but cannot be used is reported as a warning.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return defaultConfig();
    }
    try {
      return await this.load();
    } catch (error) {
      logger.warn(`${error instanceof Error ? error.message : String(error)}; using defaults`, 'config');
      return defaultConfig();
    }
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new Error(`Invalid config: ${formatValidationErrors(result.errors)}`);
    }

    await atomicWriteFile(this.configPath, JSON.stringify(config, null, 2) + '\n');
    this.config = config;
    this.cacheUpdatedAt = Date.now();
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save(defaultConfig());
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }
}
