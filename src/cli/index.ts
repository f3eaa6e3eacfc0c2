/**
 * CLI module: a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerWorkerCommand,
  registerRunCommand,
  registerEnqueueCommand,
} from './commands.js';
