export * from './config.js';
export * from './input.js';
export * from './list.js';
export * from './show.js';
