/**
 * Core execution module.
 * Run controller → step executor → locator / visual engine → artifacts.
 * Collaborators are injected; nothing here owns a client.
 */

export * from './errors.js';
export { createStepExecutor } from './stepExecutor.js';
export type {
  StepExecutor,
  StepContext,
  StepOutcome,
  StepTimeouts,
} from './stepExecutor.js';
export { createRunArtifacts } from './artifacts.js';
export type { RunArtifacts } from './artifacts.js';
export { createRunController } from './runController.js';
export type { RunController, RunControllerDeps } from './runController.js';
export { createCollaborators, createEngine } from './engine.js';
export type { EngineCollaborators, EngineOptions } from './engine.js';
