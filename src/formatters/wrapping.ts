/**
 * Wrapping formatters
 *
 * Every listed field gets a formatter that knows how wide its column may be.
 * Widths are chosen once per list so that the whole table fits the terminal:
 * columns keep their natural width when there is room, otherwise the space
 * left after fixed (never-wrapped) columns is shared out in proportion to
 * each column's natural width.
 */

import stringWidth from 'string-width';
import type {
  FieldFormatter,
  Formatter,
  FormatterMap,
  PlainFormatter,
  RenderContext,
  ResourceObject,
  SortKey,
  WrappingFormatter,
} from '../types/index.js';
import { fillText } from '../utils/wrap.js';
import { displayValue, getAttribute, normalizeObject } from './values.js';

/** Narrowest column a wrapping formatter is shrunk to */
export const MIN_COLUMN_WIDTH = 8;

/** Formatters as callers supply them: bare functions or tagged formatters */
export type FormatterInput = Record<string, FieldFormatter | Formatter>;

export interface WrappingOptions {
  /** Fields whose values must never be wrapped */
  noWrapFields?: readonly string[];
  /** Terminal width the table has to fit */
  terminalWidth: number;
}

export function plainFormatter(format: FieldFormatter): PlainFormatter {
  return { kind: 'plain', format };
}

export function isWrappingFormatter(formatter: Formatter | undefined): formatter is WrappingFormatter {
  return formatter?.kind === 'wrapping';
}

/**
 * Rendering context with wrapping suppressed
 */
export function withNoWrap(context: RenderContext): RenderContext {
  return { ...context, noWrap: true };
}

/**
 * Widest line of rendered text, in terminal columns
 */
export function getWidth(text: string): number {
  return text.split('\n').reduce((max, line) => Math.max(max, stringWidth(line)), 0);
}

/**
 * Characters used by borders and cell padding for a table of `columns` columns
 */
export function tableChromeWidth(columns: number): number {
  return 3 * columns + 1;
}

/**
 * Column width the formatter will actually wrap to
 */
export function columnCharLen(formatter: WrappingFormatter, width: number = formatter.desiredWidth): number {
  return Math.max(1, Math.min(formatter.maxWidth, Math.max(formatter.minWidth, width)));
}

/**
 * Value to sort by: the raw value for wrapping formatters, the formatted text otherwise
 */
export function unwrappedFieldValue(formatter: Formatter, obj: ResourceObject): SortKey {
  return formatter.kind === 'wrapping' ? formatter.unwrappedValue(obj) : formatter.format(obj);
}

/**
 * Format one field of an object for display
 */
export function formatField(formatter: Formatter, obj: ResourceObject, context: RenderContext): string {
  switch (formatter.kind) {
    case 'plain':
      return formatter.format(obj);
    case 'wrapping': {
      const text = formatter.render(obj);
      if (context.noWrap || formatter.noWrap) {
        return text;
      }
      const width = columnCharLen(formatter);
      return getWidth(text) <= width ? text : fillText(text, width);
    }
  }
}

/**
 * Sort key of a bare attribute: numbers stay numbers, anything else its display text
 */
export function rawSortKey(value: unknown): SortKey {
  return typeof value === 'number' ? value : displayValue(value);
}

/**
 * Build the wrapping formatter skeleton for one field (widths filled in later)
 */
function toWrapping(field: string, input: FieldFormatter | Formatter | undefined, noWrap: boolean): WrappingFormatter {
  let render: FieldFormatter;
  let unwrappedValue: (obj: ResourceObject) => SortKey;

  if (input === undefined) {
    render = (obj) => displayValue(getAttribute(obj, field));
    unwrappedValue = (obj) => rawSortKey(getAttribute(obj, field));
  } else if (typeof input === 'function') {
    render = input;
    unwrappedValue = input;
  } else if (input.kind === 'plain') {
    render = input.format;
    unwrappedValue = input.format;
  } else {
    return { ...input, noWrap: input.noWrap || noWrap };
  }

  return { kind: 'wrapping', field, render, unwrappedValue, desiredWidth: 1, minWidth: 1, maxWidth: 1, noWrap };
}

/**
 * Wrap every field's formatter and size the columns to fit the terminal
 */
export function asWrappingFormatters(
  objects: readonly ResourceObject[],
  fields: readonly string[],
  labels: readonly string[],
  formatters: FormatterInput,
  options: WrappingOptions
): FormatterMap {
  const noWrapFields = new Set(options.noWrapFields ?? []);
  const normalized = objects.map((obj) => normalizeObject(obj, fields));

  const wrapped = fields.map((field, i) => {
    const input = Object.hasOwn(formatters, field) ? formatters[field] : undefined;
    const keep = input !== undefined && typeof input !== 'function' && input.kind === 'wrapping';
    const formatter = toWrapping(field, input, noWrapFields.has(field));
    if (!keep) {
      const natural = normalized.reduce(
        (max, obj) => Math.max(max, getWidth(formatter.render(obj))),
        Math.max(1, getWidth(labels[i] ?? ''))
      );
      formatter.maxWidth = natural;
      formatter.minWidth = Math.min(natural, MIN_COLUMN_WIDTH);
      formatter.desiredWidth = natural;
    }
    return { formatter, keep };
  });

  const available = options.terminalWidth - tableChromeWidth(fields.length);
  const total = wrapped.reduce((sum, { formatter }) => sum + formatter.desiredWidth, 0);

  if (total > available) {
    const flexible = wrapped.filter(({ formatter, keep }) => !keep && !formatter.noWrap);
    const fixedTotal = total - flexible.reduce((sum, { formatter }) => sum + formatter.maxWidth, 0);
    const flexTotal = total - fixedTotal;
    const room = Math.max(0, available - fixedTotal);

    for (const { formatter } of flexible) {
      const share = Math.floor((room * formatter.maxWidth) / flexTotal);
      formatter.desiredWidth = columnCharLen(formatter, share);
    }
  }

  const result: FormatterMap = {};
  fields.forEach((field, i) => {
    result[field] = wrapped[i].formatter;
  });
  return result;
}
