import { z } from 'zod';

// ── Statuses ─────────────────────────────────────────────────

export const runStatusSchema = z.enum(['RUNNING', 'PASS', 'FAIL']);

export type RunStatus = z.infer<typeof runStatusSchema>;

export type TerminalRunStatus = Exclude<RunStatus, 'RUNNING'>;

export const visualStatusSchema = z.enum([
  'N/A',
  'PASS',
  'FAIL',
  'BASELINE_CREATED',
]);

export type VisualStatus = z.infer<typeof visualStatusSchema>;

/** Outcome of a single visual check. `N/A` is never a check result. */
export type VisualCheckResult = Exclude<VisualStatus, 'N/A'>;

export const stepStatusSchema = z.enum(['RUNNING', 'PASS', 'FAIL']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

// ── Artifacts ────────────────────────────────────────────────

export const artifactKindSchema = z.enum([
  'failure_screenshot',
  'trace',
  'visual_diff',
]);

export type ArtifactKind = z.infer<typeof artifactKindSchema>;

export const ARTIFACT_FILE_NAMES: Record<ArtifactKind, string> = {
  failure_screenshot: 'failure.png',
  trace: 'trace.zip',
  visual_diff: 'visual_failure.png',
};

export const artifactSchema = z.object({
  path: z.string().min(1),
  kind: artifactKindSchema,
});

export type Artifact = z.infer<typeof artifactSchema>;

// ── Step record ──────────────────────────────────────────────

export const stepRecordSchema = z.object({
  stepNumber: z.number().int().nonnegative(),
  action: z.string().min(1),
  target: z.string().min(1),
  status: stepStatusSchema,
  visualStatus: visualStatusSchema,
  reason: z.string().optional(),
  durationMs: z.number().int().nonnegative(),
});

export type StepRecord = z.infer<typeof stepRecordSchema>;

// ── RunOutcome ───────────────────────────────────────────────

export const runOutcomeSchema = z.object({
  runId: z.string().optional(),
  testCaseId: z.string().min(1),
  datasetName: z.string().min(1),
  status: z.enum(['PASS', 'FAIL']),
  visualStatus: visualStatusSchema,
  failureReason: z.string().optional(),
  artifactsPath: z.string().min(1),
  artifacts: z.array(artifactSchema),
  visualArtifacts: z.array(z.string()),
  steps: z.array(stepRecordSchema),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type RunOutcome = z.infer<typeof runOutcomeSchema>;

// ── Deterministic status decisions ───────────────────────────

const VISUAL_RANK: Record<VisualStatus, number> = {
  'N/A': 0,
  PASS: 1,
  BASELINE_CREATED: 2,
  FAIL: 3,
};

/**
 * Fold one visual check into the run's running visual status.
 * Any FAIL sticks; otherwise the more informative status is kept.
 */
export function mergeVisualStatus(
  current: VisualStatus,
  next: VisualStatus,
): VisualStatus {
  return VISUAL_RANK[next] > VISUAL_RANK[current] ? next : current;
}

export function aggregateVisualStatus(
  results: readonly VisualStatus[],
): VisualStatus {
  return results.reduce<VisualStatus>(mergeVisualStatus, 'N/A');
}

/**
 * Terminal status for a run whose steps have all been attempted.
 * A run with no visual steps reports visual PASS once the functional run passed.
 */
export function finalizeStatuses(
  functionalPassed: boolean,
  visualStatus: VisualStatus,
): { status: TerminalRunStatus; visualStatus: VisualStatus } {
  if (!functionalPassed) {
    return { status: 'FAIL', visualStatus };
  }
  if (visualStatus === 'FAIL') {
    return { status: 'FAIL', visualStatus };
  }
  return {
    status: 'PASS',
    visualStatus: visualStatus === 'N/A' ? 'PASS' : visualStatus,
  };
}
