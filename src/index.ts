/**
 * pagetab - paged, word-wrapped terminal tables for resource lists
 */

export * from './types/index.js';
export * from './formatters/index.js';
export * from './table/index.js';
export * from './pager/index.js';
export * from './list/index.js';
export { ConfigManager, parseConfig, validateConfig } from './config/index.js';
export type { ValidationError, ValidationResult } from './config/index.js';
export { localizeTimestamps } from './utils/time.js';
export { env } from './utils/env.js';
export { fillText, wrapText } from './utils/wrap.js';
