/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated. Precedence: flags > env > file > defaults.
 */

export {
  TIMEOUTS,
  LIMITS,
  VISUAL,
  QUEUES,
  OBJECT_PREFIXES,
} from './defaults.js';
export {
  loadConfigFile,
  loadOptionalConfigFile,
  loadWorkerConfig,
} from './loader.js';
export type { Env, ConfigOverrides } from './loader.js';
