/**
 * Attribute access and display conversion for resource objects
 */

import type { ResourceObject } from '../types/index.js';
import { localizeTimestamps } from '../utils/time.js';

/**
 * Read an own attribute; missing attributes (and inherited ones such as
 * `constructor`) read as undefined
 */
export function getAttribute(obj: ResourceObject, field: string): unknown {
  return Object.hasOwn(obj, field) ? obj[field] : undefined;
}

/**
 * Convert an attribute value to display text
 */
export function displayValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return JSON.stringify(value) ?? '';
}

/**
 * Return a copy of `obj` whose listed fields have their timestamps localized.
 * The input object is left untouched.
 */
export function normalizeObject(obj: ResourceObject, fields: readonly string[]): ResourceObject {
  const normalized: ResourceObject = { ...obj };
  for (const field of fields) {
    if (Object.hasOwn(obj, field)) {
      normalized[field] = localizeTimestamps(obj[field]);
    }
  }
  return normalized;
}
