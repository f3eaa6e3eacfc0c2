import type { BrowserSession, SessionLauncher } from '../browser/runner.js';
import { KNOWN_ELEMENTS } from '../browser/locator.js';
import type { WorkerConfig } from '../schema/config.js';
import type { ParameterSet, Step, TestCaseJob } from '../schema/job.js';
import { orderedSteps, parameterSetsOf } from '../schema/job.js';
import type { RunOutcome, StepRecord, VisualStatus } from '../schema/run.js';
import { finalizeStatuses, mergeVisualStatus } from '../schema/run.js';
import type { RunReporter } from '../report/runReporter.js';
import type { ObjectStore } from '../store/client.js';
import { runArtifactsPath, runIdentity } from '../store/client.js';
import { createRunArtifacts } from './artifacts.js';
import {
  RunTimeoutError,
  VisualMismatchError,
  messageOf,
  toFailureReason,
} from './errors.js';
import type { StepExecutor } from './stepExecutor.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface RunControllerDeps {
  launch: SessionLauncher;
  store: ObjectStore;
  reporter: RunReporter;
  stepExecutor: StepExecutor;
  config: Pick<WorkerConfig, 'browser' | 'timeouts' | 'knownElements'>;
  now?: (() => Date) | undefined;
}

export interface RunController {
  /** One outcome per parameter set, in order. Never throws for a failed test. */
  runJob(job: TestCaseJob): Promise<RunOutcome[]>;
}

// ── Factory ──────────────────────────────────────────────────

export function createRunController(deps: RunControllerDeps): RunController {
  const now = deps.now ?? (() => new Date());
  const knownElements = { ...KNOWN_ELEMENTS, ...deps.config.knownElements };
  const { timeouts, browser } = deps.config;

  async function runParameterSet(
    job: TestCaseJob,
    steps: readonly Step[],
    parameterSet: ParameterSet,
    index: number,
  ): Promise<RunOutcome> {
    const startedAt = now();
    const deadline = startedAt.getTime() + timeouts.runMs;
    const identity = runIdentity(job.test_case_id, parameterSet.dataset_name);
    const artifacts = createRunArtifacts(
      deps.store,
      runArtifactsPath(job.test_case_id, parameterSet.dataset_name, startedAt),
    );

    const report = await deps.reporter.open(job, parameterSet, index);
    log.section(
      `${job.test_case_id} [${parameterSet.dataset_name}] run ${report.runId ?? '(unrecorded)'}`,
    );
    await report.started(steps);

    const records: StepRecord[] = [];
    let visualStatus: VisualStatus = 'N/A';
    let failed = false;
    let failure: unknown;
    let session: BrowserSession | undefined;

    try {
      // ── 1. Isolated session per parameter set ────────────────

      session = await deps.launch({
        headless: !browser.liveView,
        slowMoMs: browser.slowMoMs,
        tracing: browser.tracing,
        container: browser.container,
      });
      await session.open(job.target_url, timeouts.navigationMs);

      // ── 2. Steps, strictly in order; first failure stops ─────

      for (const [i, step] of steps.entries()) {
        if (now().getTime() > deadline) {
          failed = true;
          failure = new RunTimeoutError(timeouts.runMs, step.step_number);
          break;
        }

        log.step(i, steps.length, describeStep(step));
        await report.stepStatus(step.step_number, 'RUNNING');
        const stepStarted = Date.now();

        try {
          const outcome = await deps.stepExecutor.execute(step, {
            page: session.page,
            blueprint: job.ui_blueprint,
            dataset: parameterSet.data,
            knownElements,
            runIdentity: identity,
            artifacts,
          });
          visualStatus = mergeVisualStatus(visualStatus, outcome.visualStatus);
          records.push(toRecord(step, 'PASS', outcome.visualStatus, stepStarted));
          log.stepResult(i, steps.length, true, describeStep(step));
          await report.stepStatus(step.step_number, 'PASS');
        } catch (err) {
          const stepVisual: VisualStatus =
            err instanceof VisualMismatchError ? 'FAIL' : 'N/A';
          visualStatus = mergeVisualStatus(visualStatus, stepVisual);
          const reason = toFailureReason(err);
          records.push(toRecord(step, 'FAIL', stepVisual, stepStarted, reason));
          log.stepResult(i, steps.length, false, `${describeStep(step)}: ${reason}`);
          await report.stepStatus(step.step_number, 'FAIL', reason);
          failed = true;
          failure = err;
          break;
        }
      }
    } catch (err) {
      // Launch, navigation, or an unexpected driver error.
      failed = true;
      failure = err;
      log.error(`Run aborted: ${toFailureReason(err)}`);
    }

    // ── 3. Terminal status, artifacts, teardown ─────────────────

    const { status, visualStatus: finalVisual } = finalizeStatuses(
      !failed,
      visualStatus,
    );

    if (status === 'FAIL' && session !== undefined) {
      await artifacts.captureFailure(session);
    }

    if (session !== undefined) {
      await session.close().catch((err: unknown) => {
        log.warn(`Browser did not close cleanly: ${messageOf(err)}`);
      });
    }

    const failureReason = failed ? toFailureReason(failure) : undefined;

    const finishedAt = now();
    const outcome: RunOutcome = {
      ...(report.runId !== undefined ? { runId: report.runId } : {}),
      testCaseId: job.test_case_id,
      datasetName: parameterSet.dataset_name,
      status,
      visualStatus: finalVisual,
      ...(failureReason !== undefined ? { failureReason } : {}),
      artifactsPath: artifacts.path,
      artifacts: [...artifacts.list()],
      visualArtifacts: artifacts.visualArtifacts(),
      steps: records,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    };

    log.info(
      `${job.test_case_id} [${parameterSet.dataset_name}] → ${status} (visual ${finalVisual})`,
    );
    await report.finished(outcome);
    return outcome;
  }

  return {
    async runJob(job: TestCaseJob): Promise<RunOutcome[]> {
      const steps = orderedSteps(job);
      const outcomes: RunOutcome[] = [];

      for (const [index, parameterSet] of parameterSetsOf(job).entries()) {
        outcomes.push(await runParameterSet(job, steps, parameterSet, index));
      }

      return outcomes;
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function describeStep(step: Step): string {
  return `Step ${String(step.step_number)}: ${step.action} '${step.target_element}'`;
}

function toRecord(
  step: Step,
  status: 'PASS' | 'FAIL',
  visualStatus: VisualStatus,
  startedMs: number,
  reason?: string,
): StepRecord {
  return {
    stepNumber: step.step_number,
    action: step.action,
    target: step.target_element,
    status,
    visualStatus,
    ...(reason !== undefined ? { reason } : {}),
    durationMs: Math.max(0, Date.now() - startedMs),
  };
}
