/**
 * Header word-wrap
 */

import type { Formatter, FormatterMap, RenderContext } from '../types/index.js';
import { columnCharLen, getWidth, isWrappingFormatter } from '../formatters/index.js';
import { fillText } from '../utils/wrap.js';

/**
 * Reflow a column label to the width its formatter asks for.
 * Labels of plain (or never-wrapped) columns, and all labels under a
 * no-wrap context, are returned unchanged.
 */
export function wordwrapHeader(label: string, formatter: Formatter | undefined, context: RenderContext): string {
  if (context.noWrap || !isWrappingFormatter(formatter) || formatter.noWrap) {
    return label;
  }
  const width = columnCharLen(formatter);
  return getWidth(label) <= width ? label : fillText(label, width);
}

/**
 * Wrapped header labels for every field
 */
export function wrapHeaderLabels(
  fields: readonly string[],
  labels: readonly string[],
  formatters: FormatterMap,
  context: RenderContext
): string[] {
  return fields.map((field, i) =>
    wordwrapHeader(labels[i] ?? '', Object.hasOwn(formatters, field) ? formatters[field] : undefined, context)
  );
}
