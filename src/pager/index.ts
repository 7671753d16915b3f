/**
 * Pager module exports
 */

export { ListPager } from './list-pager.js';
export type { PagerOptions, PagerState } from './types.js';
export { getTerminalSize, queryWindowSize } from './terminal.js';
export type { TerminalSizeOptions } from './terminal.js';
export { CONTINUE_PROMPT, QUIT_ANSWER, isQuitAnswer, readLine } from './prompt.js';
export type { PromptStreams } from './prompt.js';
