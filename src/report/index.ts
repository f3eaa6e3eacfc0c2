/**
 * Run reporting module.
 * Run-record persistence and live progress. Best-effort: never throws
 * into the run.
 */

export {
  createHttpClient,
  createHttpRunRecordStore,
  createHttpLiveProgress,
} from './http.js';
export type { RunRecordStore, LiveProgressChannel } from './http.js';
export { createRunReporter } from './runReporter.js';
export { createOfflineRunRecords, createOfflineLiveProgress } from './offline.js';
export type { RunReporter, RunReport, RunReporterOptions } from './runReporter.js';
export { generateJSON, serializeJSON, generateMarkdown } from './summary.js';
export type { JsonOutput } from './summary.js';
