import { OBJECT_PREFIXES } from '../config/defaults.js';

// ── ObjectStore interface ────────────────────────────────────

export interface ObjectStore {
  /** Object body, or undefined when no object exists under `key`. */
  get(key: string): Promise<Buffer | undefined>;
  put(key: string, body: Buffer, contentType: string): Promise<void>;
}

// ── Key layout ───────────────────────────────────────────────

/**
 * Lowercase, path-safe slug. Keeps letters, digits, dash and underscore;
 * everything else collapses to a single dash.
 */
export function slugify(value: string): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
  return slug.length > 0 ? slug : 'unnamed';
}

/** Stable identity shared by every rerun of a test case with one dataset. */
export function runIdentity(testCaseId: string, datasetName: string): string {
  return `${slugify(testCaseId)}/${slugify(datasetName)}`;
}

export function baselineKey(identity: string, stepName: string): string {
  return `${OBJECT_PREFIXES.BASELINES}/${identity}/${slugify(stepName)}.png`;
}

/**
 * Artifact directory for one run. The timestamp slug keeps redelivered
 * jobs from overwriting an earlier attempt's artifacts.
 */
export function runArtifactsPath(
  testCaseId: string,
  datasetName: string,
  startedAt: Date,
): string {
  const stamp = startedAt.toISOString().replace(/[:.]/g, '-');
  return `${OBJECT_PREFIXES.RUNS}/${slugify(testCaseId)}/${slugify(datasetName)}-${stamp}`;
}
