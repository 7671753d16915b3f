export * from './config.js';
export * from './resource.js';
