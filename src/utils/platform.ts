/**
 * Platform detection utilities
 *
 * Used to decide whether interactive paging is possible.
 */

/**
 * Check if the continue prompt can be shown and answered
 *
 * Paging needs a terminal to draw pages on and a keyboard to read the
 * answer from; stderr may be redirected.
 */
export function canPromptForPages(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}
