/**
 * Sorting for list output
 */

import type { FormatterMap, ResourceObject, SortKey } from '../types/index.js';
import { getAttribute, rawSortKey, unwrappedFieldValue } from '../formatters/index.js';

/**
 * Order two sort keys: numbers numerically, anything else by its text
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Sort objects by the field at index `sortBy`.
 *
 * The key is the formatter's unwrapped value when the field has a formatter,
 * the raw attribute otherwise (missing attributes sort as empty text). The
 * sort is stable in both directions: objects with equal keys keep their
 * input order even when `reverse` is set. A null `sortBy` returns the
 * objects in input order. The input array is not modified.
 */
export function sortForList(
  objects: readonly ResourceObject[],
  fields: readonly string[],
  formatters: FormatterMap,
  sortBy: number | null,
  reverse: boolean = false
): ResourceObject[] {
  if (sortBy === null) {
    return [...objects];
  }
  if (!Number.isInteger(sortBy) || sortBy < 0 || sortBy >= fields.length) {
    throw new Error(`Sort index ${sortBy} is out of range for ${fields.length} fields`);
  }

  const field = fields[sortBy];
  const formatter = Object.hasOwn(formatters, field) ? formatters[field] : undefined;
  const keyOf = (obj: ResourceObject): SortKey =>
    formatter ? unwrappedFieldValue(formatter, obj) : rawSortKey(getAttribute(obj, field));

  const direction = reverse ? -1 : 1;
  return objects
    .map((obj) => ({ obj, key: keyOf(obj) }))
    .sort((a, b) => direction * compareSortKeys(a.key, b.key))
    .map(({ obj }) => obj);
}
