/**
 * Core types for table rendering and paging
 */

/** An API resource object as returned by a list call */
export type ResourceObject = Record<string, unknown>;

/** A caller-supplied field formatter */
export type FieldFormatter = (obj: ResourceObject) => string;

/** Value used to order objects when sorting a list */
export type SortKey = string | number;

/**
 * Formatter that converts an object to display text as-is
 */
export interface PlainFormatter {
  kind: 'plain';
  format: FieldFormatter;
}

/**
 * Formatter that knows its column width and can reflow its text
 */
export interface WrappingFormatter {
  kind: 'wrapping';
  /** Field this formatter renders */
  field: string;
  /** Unwrapped display text */
  render: FieldFormatter;
  /** Raw value used for sorting */
  unwrappedValue: (obj: ResourceObject) => SortKey;
  /** Column width chosen to fit the terminal */
  desiredWidth: number;
  minWidth: number;
  maxWidth: number;
  /** Field was forced to never wrap */
  noWrap: boolean;
}

export type Formatter = PlainFormatter | WrappingFormatter;

export type FormatterMap = Record<string, Formatter>;

/**
 * Rendering settings threaded through header wrap, row build and paging
 */
export interface RenderContext {
  /** Suppress all word wrapping */
  noWrap: boolean;
}

/** Terminal size in character cells */
export interface TerminalSize {
  width: number;
  height: number;
}

/** Output sink: receives one rendered block per call */
export type Printer = (text: string) => void;

/** Asks the user a question and resolves with the typed line */
export type PromptFn = (question: string) => Promise<string>;
