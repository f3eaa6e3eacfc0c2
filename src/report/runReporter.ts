import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { ParameterSet, Step, TestCaseJob } from '../schema/job.js';
import type { RunOutcome, StepStatus } from '../schema/run.js';
import type { FinalStatusPayload } from '../schema/reporting.js';
import { messageOf } from '../core/errors.js';
import type { LiveProgressChannel, RunRecordStore } from './http.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface RunReporterOptions {
  runRecords: RunRecordStore;
  liveProgress: LiveProgressChannel;
  finalStatusAttempts?: number | undefined;
  finalStatusRetryWaitMs?: number | undefined;
}

/** Handle for one run's reporting. `runId` is undefined if no record exists. */
export interface RunReport {
  readonly runId: string | undefined;
  started(steps: readonly Step[]): Promise<void>;
  stepStatus(stepNumber: number, status: StepStatus, reason?: string): Promise<void>;
  finished(outcome: RunOutcome): Promise<void>;
}

/**
 * Pushes run lifecycle to the run-record store and, for live-view jobs,
 * to the live-progress channel. Never throws: reporting failures cost
 * observability, never the run's status.
 */
export interface RunReporter {
  open(job: TestCaseJob, parameterSet: ParameterSet, index: number): Promise<RunReport>;
}

// ── Factory ──────────────────────────────────────────────────

export function createRunReporter(options: RunReporterOptions): RunReporter {
  const attempts = options.finalStatusAttempts ?? LIMITS.FINAL_STATUS_ATTEMPTS;
  const retryWait = options.finalStatusRetryWaitMs ?? TIMEOUTS.FINAL_STATUS_RETRY_WAIT;

  async function resolveRunId(
    job: TestCaseJob,
    parameterSet: ParameterSet,
    index: number,
  ): Promise<string | undefined> {
    // The dispatcher pre-creates the record for the first dataset only.
    if (index === 0 && job.run_id !== undefined) {
      return String(job.run_id);
    }
    try {
      const record = await options.runRecords.createRun({
        objective: job.objective,
        test_case_id: job.test_case_id,
        parameters: [parameterSet],
      });
      return String(record.id);
    } catch (err) {
      log.warn(
        `Could not create run record for ${job.test_case_id}/${parameterSet.dataset_name}: ${messageOf(err)}`,
      );
      return undefined;
    }
  }

  async function finalize(runId: string, payload: FinalStatusPayload): Promise<boolean> {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await options.runRecords.finalizeRun(runId, payload);
        return true;
      } catch (err) {
        log.warn(
          `Final status write for run ${runId} failed (attempt ${String(attempt)}/${String(attempts)}): ${messageOf(err)}`,
        );
        if (attempt < attempts) await delay(retryWait);
      }
    }
    log.error(`Run ${runId} left in RUNNING: final status could not be written`);
    return false;
  }

  return {
    async open(job, parameterSet, index): Promise<RunReport> {
      const runId = await resolveRunId(job, parameterSet, index);
      const live = job.is_live_view;

      async function push(
        send: (channel: LiveProgressChannel, id: string) => Promise<void>,
      ): Promise<void> {
        if (!live || runId === undefined) return;
        try {
          await send(options.liveProgress, runId);
        } catch (err) {
          log.warn(`Live update for run ${runId} not delivered: ${messageOf(err)}`);
        }
      }

      return {
        runId,

        async started(steps: readonly Step[]): Promise<void> {
          await push((channel, id) =>
            channel.update(id, {
              type: 'run_start',
              status: 'RUNNING',
              steps: steps.map((s) => ({
                step_number: s.step_number,
                action: s.action,
                target_element: s.target_element,
              })),
            }),
          );
        },

        async stepStatus(
          stepNumber: number,
          status: StepStatus,
          reason?: string,
        ): Promise<void> {
          await push((channel, id) =>
            channel.update(id, {
              type: 'step_result',
              step: stepNumber,
              status,
              ...(reason !== undefined ? { reason } : {}),
            }),
          );
        },

        async finished(outcome: RunOutcome): Promise<void> {
          await push((channel, id) =>
            channel.update(id, {
              type: 'run_end',
              status: outcome.status,
              visual_status: outcome.visualStatus,
              ...(outcome.failureReason !== undefined
                ? { reason: outcome.failureReason }
                : {}),
            }),
          );

          if (runId === undefined) return;

          await finalize(runId, {
            status: outcome.status,
            visual_status: outcome.visualStatus,
            failure_reason: outcome.failureReason ?? null,
            artifacts_path: outcome.artifactsPath,
            visual_artifacts: outcome.visualArtifacts,
          });

          await push((channel, id) =>
            channel.broadcast({
              run_id: id,
              test_case_id: outcome.testCaseId,
              dataset_name: outcome.datasetName,
              status: outcome.status,
              visual_status: outcome.visualStatus,
              failure_reason: outcome.failureReason ?? null,
            }),
          );
        },
      };
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
