/**
 * Config schema validation
 */

import type { Config, TerminalDefaults } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { isRecord } from '../utils/guards.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function validateTerminal(terminal: unknown, path: string): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!isRecord(terminal)) {
    errors.push({ path, message: 'terminal must be an object' });
    return errors;
  }

  for (const key of ['width', 'height']) {
    if (terminal[key] !== undefined && !isPositiveInteger(terminal[key])) {
      errors.push({ path: `${path}.${key}`, message: `${key} must be a positive integer` });
    }
  }

  return errors;
}

/**
 * Check a parsed config. Every setting but `version` is optional and falls
 * back to its default.
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  if (config.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  for (const key of ['paging', 'wrap']) {
    if (config[key] !== undefined && typeof config[key] !== 'boolean') {
      errors.push({ path: key, message: `${key} must be a boolean` });
    }
  }

  if (config.terminal !== undefined) {
    errors.push(...validateTerminal(config.terminal, 'terminal'));
  }

  return { valid: errors.length === 0, errors };
}

function pickTerminal(value: unknown): TerminalDefaults {
  const terminal = isRecord(value) ? value : {};
  return {
    width: isPositiveInteger(terminal.width) ? terminal.width : DEFAULT_CONFIG.terminal.width,
    height: isPositiveInteger(terminal.height) ? terminal.height : DEFAULT_CONFIG.terminal.height,
  };
}

/**
 * Fill a validated config in with defaults
 */
function toConfig(value: Record<string, unknown>): Config {
  return {
    version: 1,
    paging: typeof value.paging === 'boolean' ? value.paging : DEFAULT_CONFIG.paging,
    wrap: typeof value.wrap === 'boolean' ? value.wrap : DEFAULT_CONFIG.wrap,
    terminal: pickTerminal(value.terminal),
  };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  const result = validateConfig(parsed);
  if (!result.valid || !isRecord(parsed)) {
    return { config: null, errors: result.errors };
  }

  return { config: toConfig(parsed), errors: [] };
}

/**
 * Format validation errors as a single line
 */
export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');
}
