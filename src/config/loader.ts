import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { QUEUES } from './defaults.js';
import { fileConfigSchema, workerConfigSchema } from '../schema/config.js';
import type { FileConfig, WorkerConfig } from '../schema/config.js';

// ── Public types ─────────────────────────────────────────────

export type Env = Readonly<Record<string, string | undefined>>;

/** Flags from the command line. Anything set here wins over file and env. */
export interface ConfigOverrides {
  liveView?: boolean | undefined;
  queue?: string | undefined;
  tracing?: boolean | undefined;
}

// ── File loading ─────────────────────────────────────────────

/**
 * Load and validate a `.uiverify.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return fileConfigSchema.parse(parsed ?? {});
}

/** Like `loadConfigFile`, but a missing file yields an empty config. */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
}

// ── Merge ────────────────────────────────────────────────────

/**
 * Build the worker config. Precedence: CLI overrides > env > file > defaults.
 */
export function loadWorkerConfig(
  env: Env,
  file: FileConfig = {},
  overrides: ConfigOverrides = {},
): WorkerConfig {
  const liveView =
    overrides.liveView ??
    parseBool(env['LIVE_VIEW']) ??
    file.browser?.liveView ??
    false;

  const queue =
    overrides.queue ??
    env['EXECUTION_QUEUE'] ??
    file.broker?.queue ??
    (liveView ? QUEUES.LIVE_VIEW : QUEUES.STANDARD);

  return workerConfigSchema.parse({
    broker: {
      ...file.broker,
      ...defined({
        url: env['AMQP_URL'],
        reconnectDelayMs: parseNumber(env['AMQP_RECONNECT_DELAY_MS']),
      }),
      queue,
    },
    objectStore: {
      ...file.objectStore,
      ...defined({
        endPoint: env['MINIO_ENDPOINT'],
        port: parseNumber(env['MINIO_PORT']),
        useSSL: parseBool(env['MINIO_USE_SSL']),
        accessKey: env['MINIO_ACCESS_KEY'],
        secretKey: env['MINIO_SECRET_KEY'],
        bucket: env['MINIO_BUCKET'],
      }),
    },
    services: {
      ...file.services,
      ...defined({
        runRecordUrl: env['RUN_RECORD_URL'],
        liveProgressUrl: env['LIVE_PROGRESS_URL'],
      }),
    },
    browser: {
      ...file.browser,
      ...defined({
        tracing: overrides.tracing ?? parseBool(env['TRACING']),
        container: parseBool(env['DOCKER_ENV']),
      }),
      liveView,
    },
    visual: { ...file.visual },
    timeouts: { ...file.timeouts },
    knownElements: { ...file.knownElements },
  });
}

// ── Helpers ──────────────────────────────────────────────────

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  if (Number.isNaN(n)) {
    throw new Error(`Expected a number, got "${value}"`);
  }
  return n;
}

/** Drop undefined entries so they do not shadow lower-precedence values. */
function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
