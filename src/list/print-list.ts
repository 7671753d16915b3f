/**
 * List printer
 *
 * Entry point for tabular output: sizes the columns for the terminal, sorts,
 * then feeds every object through a pager until the list ends or the user
 * quits.
 */

import type { PromptFn, Printer, ResourceObject, TerminalSize } from '../types/index.js';
import { asWrappingFormatters } from '../formatters/index.js';
import type { FormatterInput } from '../formatters/index.js';
import { ListPager, getTerminalSize } from '../pager/index.js';
import { sortForList } from './sort.js';

export interface ListOptions {
  /** Formatters by field; fields without one show their attribute */
  formatters?: FormatterInput;
  /** Index into `fields` to sort by, or null to keep input order (default: 0) */
  sortBy?: number | null;
  /** Sort descending */
  reverse?: boolean;
  /** Fields whose values are never wrapped */
  noWrapFields?: readonly string[];
  /** Pause after each screenful (default: true) */
  paging?: boolean;
  /** Turn off wrapping for the whole table */
  noWrap?: boolean;
  printer?: Printer;
  prompt?: PromptFn;
  /** Terminal size (default: queried from the attached terminal) */
  terminal?: TerminalSize;
}

/**
 * Print objects as a table, one row per object, paged by default.
 * Resolves once every row was printed or the user quit.
 */
export async function printLongList(
  objects: readonly ResourceObject[],
  fields: readonly string[],
  labels: readonly string[],
  options: ListOptions = {}
): Promise<void> {
  const terminal = options.terminal ?? getTerminalSize();
  const formatters = asWrappingFormatters(objects, fields, labels, options.formatters ?? {}, {
    noWrapFields: options.noWrapFields,
    terminalWidth: terminal.width,
  });
  const sortBy = options.sortBy === undefined ? 0 : options.sortBy;
  const sorted = sortForList(objects, fields, formatters, sortBy, options.reverse);

  const pager = new ListPager({
    fields,
    labels,
    formatters,
    paging: options.paging ?? true,
    context: { noWrap: options.noWrap ?? false },
    printer: options.printer,
    prompt: options.prompt,
    terminal,
  });

  for (const obj of sorted) {
    if (!(await pager.addRow(obj))) {
      break;
    }
  }
  pager.done();
}

/**
 * Print objects as a single table without paging
 */
export async function printList(
  objects: readonly ResourceObject[],
  fields: readonly string[],
  labels: readonly string[],
  options: Omit<ListOptions, 'paging' | 'prompt'> = {}
): Promise<void> {
  await printLongList(objects, fields, labels, { ...options, paging: false });
}
