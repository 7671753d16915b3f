/**
 * Display height of table cells and rows
 */

/**
 * Number of lines a cell occupies (1 for empty text)
 */
export function strHeight(text: string | null | undefined): number {
  if (!text) {
    return 1;
  }
  return text.split('\n').length;
}

/**
 * Number of lines a row occupies: cells sit side by side, so the tallest wins
 */
export function rowHeight(texts: ReadonlyArray<string | null | undefined>): number {
  return texts.reduce<number>((max, text) => Math.max(max, strHeight(text)), 1);
}
