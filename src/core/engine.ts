import { launchSession } from '../browser/runner.js';
import type { SessionLauncher } from '../browser/runner.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { WorkerConfig } from '../schema/config.js';
import {
  createHttpClient,
  createHttpLiveProgress,
  createHttpRunRecordStore,
} from '../report/http.js';
import type { LiveProgressChannel, RunRecordStore } from '../report/http.js';
import { createOfflineLiveProgress, createOfflineRunRecords } from '../report/offline.js';
import { createRunReporter } from '../report/runReporter.js';
import type { ObjectStore } from '../store/client.js';
import { createMemoryStore } from '../store/memory.js';
import { createMinioClient, createMinioStore } from '../store/minio.js';
import { createVisualEngine } from '../visual/engine.js';
import { createRunController } from './runController.js';
import type { RunController } from './runController.js';
import { createStepExecutor } from './stepExecutor.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface EngineCollaborators {
  store: ObjectStore;
  runRecords: RunRecordStore;
  liveProgress: LiveProgressChannel;
  launch: SessionLauncher;
}

export interface EngineOptions {
  /** In-memory store and no run-record or live-progress service. */
  offline?: boolean | undefined;
}

// ── Wiring ───────────────────────────────────────────────────

/**
 * Build the real collaborators from config. Clients are created here and
 * handed down; no component reaches for a global client.
 */
export async function createCollaborators(
  config: WorkerConfig,
  options: EngineOptions = {},
): Promise<EngineCollaborators> {
  if (options.offline) {
    log.info('Offline mode: in-memory object store, no run-record service');
    return {
      store: createMemoryStore(),
      runRecords: createOfflineRunRecords(),
      liveProgress: createOfflineLiveProgress(),
      launch: launchSession,
    };
  }

  const store = createMinioStore(
    createMinioClient(config.objectStore),
    config.objectStore.bucket,
  );
  await store.ensureBucket();

  return {
    store,
    runRecords: createHttpRunRecordStore(
      createHttpClient(config.services.runRecordUrl, TIMEOUTS.RUN_RECORD_REQUEST),
    ),
    liveProgress: createHttpLiveProgress(
      createHttpClient(config.services.liveProgressUrl, TIMEOUTS.LIVE_PROGRESS_REQUEST),
    ),
    launch: launchSession,
  };
}

export function createEngine(
  config: WorkerConfig,
  collaborators: EngineCollaborators,
): RunController {
  const visual = createVisualEngine(collaborators.store, config.visual);
  const stepExecutor = createStepExecutor(visual, config.timeouts);
  const reporter = createRunReporter({
    runRecords: collaborators.runRecords,
    liveProgress: collaborators.liveProgress,
  });

  return createRunController({
    launch: collaborators.launch,
    store: collaborators.store,
    reporter,
    stepExecutor,
    config,
  });
}
