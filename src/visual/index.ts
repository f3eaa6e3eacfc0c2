/**
 * Visual regression module.
 * Screenshot baselines in the object store, compared with pixelmatch.
 */

export { comparePng } from './compare.js';
export type { CompareOptions, CompareResult } from './compare.js';
export { createVisualEngine } from './engine.js';
export type { VisualCheckOutcome, VisualRegressionEngine } from './engine.js';
