import type { ExecutionPage } from '../browser/runner.js';
import type { RunArtifacts } from '../core/artifacts.js';
import type { VisualCheckResult } from '../schema/run.js';
import type { ObjectStore } from '../store/client.js';
import { baselineKey } from '../store/client.js';
import type { CompareOptions } from './compare.js';
import { comparePng } from './compare.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface VisualCheckOutcome {
  result: VisualCheckResult;
  baselineKey: string;
  /** Share of differing pixels; absent when a baseline was just created. */
  diffRatio?: number;
}

export interface VisualRegressionEngine {
  check(
    page: Pick<ExecutionPage, 'screenshot'>,
    runIdentity: string,
    stepName: string,
    artifacts?: Pick<RunArtifacts, 'recordVisualFailure'>,
  ): Promise<VisualCheckOutcome>;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Baseline lifecycle: absent → created from the current screenshot
 * (non-failing); present → compared, never overwritten.
 */
export function createVisualEngine(
  store: ObjectStore,
  options: CompareOptions,
): VisualRegressionEngine {
  return {
    async check(page, runIdentity, stepName, artifacts) {
      const key = baselineKey(runIdentity, stepName);
      const current = await page.screenshot();
      const baseline = await store.get(key);

      if (baseline === undefined) {
        await store.put(key, current, 'image/png');
        log.visual(`Baseline created for '${stepName}' → ${key}`);
        return { result: 'BASELINE_CREATED', baselineKey: key };
      }

      const comparison = comparePng(baseline, current, options);

      if (comparison.match) {
        log.visual(`'${stepName}' matches baseline`);
        return { result: 'PASS', baselineKey: key, diffRatio: comparison.diffRatio };
      }

      log.visual(
        comparison.reason === 'dimensions'
          ? `'${stepName}' differs from baseline in size`
          : `'${stepName}' differs from baseline (${String(comparison.diffPixels)} pixels)`,
      );
      await artifacts?.recordVisualFailure(current);
      return { result: 'FAIL', baselineKey: key, diffRatio: comparison.diffRatio };
    },
  };
}
