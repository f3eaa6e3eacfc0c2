/**
 * Browser module.
 * Deterministic Playwright session plus blueprint-driven locator resolution.
 */

export {
  resolveLocator,
  requireLocator,
  KNOWN_ELEMENTS,
  LOCATOR_STRATEGIES,
} from './locator.js';
export type { LocatorResolution } from './locator.js';
export { toPlaywrightLocator, describeSelector } from './selectors.js';
export { launchSession } from './runner.js';
export type {
  BrowserSession,
  ElementTarget,
  ExecutionPage,
  LoadState,
  SessionLauncher,
  SessionOptions,
} from './runner.js';
