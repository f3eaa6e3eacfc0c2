import type { BrowserSession } from '../browser/runner.js';
import type { ObjectStore } from '../store/client.js';
import type { Artifact, ArtifactKind } from '../schema/run.js';
import { ARTIFACT_FILE_NAMES } from '../schema/run.js';
import { messageOf } from './errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface RunArtifacts {
  /** Artifact directory, fixed for the lifetime of the run. */
  readonly path: string;
  list(): readonly Artifact[];
  /** File names of uploaded visual diagnostics, relative to `path`. */
  visualArtifacts(): string[];
  /** Upload a mismatching screenshot. Only the first call per run uploads. */
  recordVisualFailure(screenshot: Buffer): Promise<void>;
  /**
   * Capture the failure screenshot and trace. Only the first call per run
   * does anything. Never throws: a capture problem must not hide the
   * failure that triggered it.
   */
  captureFailure(session: BrowserSession): Promise<void>;
}

const CONTENT_TYPES: Record<ArtifactKind, string> = {
  failure_screenshot: 'image/png',
  trace: 'application/zip',
  visual_diff: 'image/png',
};

// ── Factory ──────────────────────────────────────────────────

export function createRunArtifacts(
  store: ObjectStore,
  artifactsPath: string,
): RunArtifacts {
  const artifacts: Artifact[] = [];
  let failureCaptured = false;
  let visualRecorded = false;

  async function upload(kind: ArtifactKind, body: Buffer): Promise<void> {
    const key = `${artifactsPath}/${ARTIFACT_FILE_NAMES[kind]}`;
    await store.put(key, body, CONTENT_TYPES[kind]);
    artifacts.push({ path: key, kind });
    log.artifact(`Uploaded ${kind} → ${key}`);
  }

  return {
    path: artifactsPath,

    list(): readonly Artifact[] {
      return artifacts;
    },

    visualArtifacts(): string[] {
      return artifacts
        .filter((a) => a.kind === 'visual_diff')
        .map(() => ARTIFACT_FILE_NAMES.visual_diff);
    },

    async recordVisualFailure(screenshot: Buffer): Promise<void> {
      if (visualRecorded) return;
      visualRecorded = true;
      try {
        await upload('visual_diff', screenshot);
      } catch (err) {
        log.warn(`Could not upload visual diff: ${messageOf(err)}`);
      }
    },

    async captureFailure(session: BrowserSession): Promise<void> {
      if (failureCaptured) return;
      failureCaptured = true;

      try {
        const screenshot = await session.page.screenshot();
        await upload('failure_screenshot', screenshot);
      } catch (err) {
        log.warn(`Could not capture failure screenshot: ${messageOf(err)}`);
      }

      if (!session.tracing) return;

      try {
        const trace = await session.stopTrace();
        if (trace) {
          await upload('trace', trace);
        }
      } catch (err) {
        log.warn(`Could not capture trace: ${messageOf(err)}`);
      }
    },
  };
}
