/**
 * Default configuration values.
 * All values are overridable via config file, environment or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 60_000,
  ELEMENT_VISIBLE_TIMEOUT: 10_000,
  NETWORK_IDLE_TIMEOUT: 10_000,
  // Longer than the bounded waits of a CLICK step combined.
  STEP_TIMEOUT: 120_000,
  TOTAL_RUN_TIMEOUT: 300_000,
  LIVE_PROGRESS_REQUEST: 5_000,
  RUN_RECORD_REQUEST: 30_000,
  RECONNECT_BACKOFF: 5_000,
  FINAL_STATUS_RETRY_WAIT: 2_000,
} as const;

export const LIMITS = {
  PREFETCH: 1,
  FINAL_STATUS_ATTEMPTS: 3,
  MAX_REASON_CHARS: 500,
} as const;

export const VISUAL = {
  PIXEL_THRESHOLD: 0.1,
  MAX_DIFF_PIXEL_RATIO: 0.001,
} as const;

export const QUEUES = {
  STANDARD: 'execution_queue',
  LIVE_VIEW: 'live_execution_queue',
} as const;

export const OBJECT_PREFIXES = {
  BASELINES: 'baselines',
  RUNS: 'runs',
} as const;
