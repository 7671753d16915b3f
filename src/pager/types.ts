/**
 * Pager types
 */

import type { FormatterMap, Printer, PromptFn, RenderContext, TerminalSize } from '../types/index.js';

/**
 * Pager lifecycle
 *
 * empty        -> no table built yet
 * accumulating -> rows are being added to the current page
 * page-full    -> page flushed, waiting for the continue prompt
 * terminated   -> user quit; further rows are refused
 * finished     -> done() flushed the last page
 */
export type PagerState = 'empty' | 'accumulating' | 'page-full' | 'terminated' | 'finished';

export interface PagerOptions {
  /** Field identifiers, in column order */
  fields: readonly string[];
  /** Column labels before header wrapping, one per field */
  labels: readonly string[];
  formatters: FormatterMap;
  /** Pause after each screenful (default: true) */
  paging?: boolean;
  /** Rendering settings (default: wrapping on) */
  context?: RenderContext;
  /** Output sink (default: console.log) */
  printer?: Printer;
  /** Continue prompt (default: a line read from stdin) */
  prompt?: PromptFn;
  /** Terminal size (default: queried once at construction) */
  terminal?: TerminalSize;
}
