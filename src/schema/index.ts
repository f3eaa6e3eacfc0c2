/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './job.js';
export * from './run.js';
export * from './selector.js';
export * from './reporting.js';
export * from './config.js';
