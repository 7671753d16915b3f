/**
 * List output exports
 */

export { printList, printLongList } from './print-list.js';
export type { ListOptions } from './print-list.js';
export { printDict } from './print-dict.js';
export type { DictOptions } from './print-dict.js';
export { compareSortKeys, sortForList } from './sort.js';
