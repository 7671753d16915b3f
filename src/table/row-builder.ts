/**
 * Row builder: resource object -> ordered display values
 */

import type { FormatterMap, RenderContext, ResourceObject } from '../types/index.js';
import { displayValue, formatField, getAttribute, normalizeObject } from '../formatters/index.js';

/**
 * Build the display values for one object, one per field.
 *
 * Fields are read from a timestamp-localized copy of the object; a field
 * with a formatter is rendered by it (so the formatter also sees localized
 * values), any other field shows its attribute. Missing attributes show as
 * empty text. The object itself is not modified.
 */
export function buildRow(
  fields: readonly string[],
  formatters: FormatterMap,
  obj: ResourceObject,
  context: RenderContext
): string[] {
  const normalized = normalizeObject(obj, fields);
  return fields.map((field) => {
    const formatter = Object.hasOwn(formatters, field) ? formatters[field] : undefined;
    if (formatter) {
      return formatField(formatter, normalized, context);
    }
    return displayValue(getAttribute(normalized, field));
  });
}
