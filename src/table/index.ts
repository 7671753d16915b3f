/**
 * Table module exports
 */

export { strHeight, rowHeight } from './height.js';
export { buildRow } from './row-builder.js';
export { wordwrapHeader, wrapHeaderLabels } from './header.js';
export { ResourceTable, headerHeight, TABLE_BORDER_LINES, PROMPT_LINES } from './renderer.js';
