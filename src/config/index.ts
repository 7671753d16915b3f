/**
 * Config module exports
 */

export { ConfigManager } from './manager.js';
export { validateConfig, parseConfig, formatValidationErrors } from './schema.js';
export type { ValidationError, ValidationResult } from './schema.js';
