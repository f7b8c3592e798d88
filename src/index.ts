export * from './parser/index.js';
export * from './graph/index.js';
export * from './reconcile/index.js';
export * from './github/index.js';
export * from './config/index.js';
export * from './sync/index.js';
