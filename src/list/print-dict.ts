/**
 * Property/value table for a single resource
 */

import type { Printer, ResourceObject } from '../types/index.js';
import { displayValue } from '../formatters/index.js';
import { ResourceTable } from '../table/index.js';
import { fillText } from '../utils/wrap.js';
import { localizeTimestamps } from '../utils/time.js';

/** Escaped line break some servers leave inside values (a backslash and an n) */
const ESCAPED_NEWLINE = '\\n';

export interface DictOptions {
  /** Label of the key column (default: 'Property') */
  propertyLabel?: string;
  /** Wrap values to this many columns; 0 leaves them as they are */
  wrap?: number;
  printer?: Printer;
}

/**
 * Print one record as a two-column table, keys in sorted order.
 *
 * Values containing escaped line breaks (tracebacks and the like) are spread
 * over several rows with the key on the first one only.
 */
export function printDict(record: ResourceObject, options: DictOptions = {}): void {
  const printer = options.printer ?? ((text: string) => console.log(text));
  const wrap = options.wrap ?? 0;
  const table = new ResourceTable([options.propertyLabel ?? 'Property', 'Value']);

  for (const key of Object.keys(record).sort()) {
    let value = displayValue(localizeTimestamps(record[key]));
    if (wrap > 0) {
      value = fillText(value, wrap);
    }

    if (!value.includes(ESCAPED_NEWLINE)) {
      table.addRow([key, value]);
      continue;
    }
    value
      .trim()
      .split(ESCAPED_NEWLINE)
      .forEach((line, i) => table.addRow([i === 0 ? key : '', line]));
  }

  printer(table.toString());
}
