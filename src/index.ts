/**
 * Public API of the execution engine.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './browser/index.js';
export * from './store/index.js';
export * from './visual/index.js';
export * from './core/index.js';
export * from './report/index.js';
export * from './queue/index.js';
