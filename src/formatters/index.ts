/**
 * Formatter module exports
 */

export {
  asWrappingFormatters,
  columnCharLen,
  formatField,
  getWidth,
  isWrappingFormatter,
  plainFormatter,
  rawSortKey,
  tableChromeWidth,
  unwrappedFieldValue,
  withNoWrap,
  MIN_COLUMN_WIDTH,
} from './wrapping.js';
export type { FormatterInput, WrappingOptions } from './wrapping.js';
export { displayValue, getAttribute, normalizeObject } from './values.js';
