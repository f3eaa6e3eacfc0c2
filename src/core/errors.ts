import { LIMITS } from '../config/defaults.js';

// ── Failure taxonomy ─────────────────────────────────────────
// Every terminal step failure is an ExecutionError. Anything else that
// escapes a step is an unexpected driver error and is reported as-is.

export type FailureKind =
  | 'locator_not_found'
  | 'element_not_visible'
  | 'navigation_timeout'
  | 'verification_failed'
  | 'visual_mismatch'
  | 'step_timeout'
  | 'run_timeout';

export abstract class ExecutionError extends Error {
  abstract readonly kind: FailureKind;
}

export class LocatorNotFoundError extends ExecutionError {
  readonly kind = 'locator_not_found';
  readonly targetName: string;

  constructor(targetName: string) {
    super(`Could not determine a locator for '${targetName}'`);
    this.name = 'LocatorNotFoundError';
    this.targetName = targetName;
  }
}

export class ElementNotVisibleError extends ExecutionError {
  readonly kind = 'element_not_visible';
  readonly targetName: string;
  readonly timeoutMs: number;

  constructor(targetName: string, timeoutMs: number, cause?: unknown) {
    super(
      `Element '${targetName}' not visible within ${String(timeoutMs)}ms`,
      { cause },
    );
    this.name = 'ElementNotVisibleError';
    this.targetName = targetName;
    this.timeoutMs = timeoutMs;
  }
}

export class NavigationTimeoutError extends ExecutionError {
  readonly kind = 'navigation_timeout';
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Navigation to ${url} failed: ${messageOf(cause)}`, { cause });
    this.name = 'NavigationTimeoutError';
    this.url = url;
  }
}

export class VerificationFailedError extends ExecutionError {
  readonly kind = 'verification_failed';
  readonly targetName: string;
  readonly verificationElement: string;

  constructor(targetName: string, verificationElement: string, detail: string) {
    super(
      `Verification failed after clicking '${targetName}': '${verificationElement}' ${detail}`,
    );
    this.name = 'VerificationFailedError';
    this.targetName = targetName;
    this.verificationElement = verificationElement;
  }
}

export class VisualMismatchError extends ExecutionError {
  readonly kind = 'visual_mismatch';
  readonly stepName: string;
  readonly diffRatio: number;

  constructor(stepName: string, diffRatio: number) {
    super(
      `Visual mismatch for '${stepName}': ${(diffRatio * 100).toFixed(2)}% of pixels differ from baseline`,
    );
    this.name = 'VisualMismatchError';
    this.stepName = stepName;
    this.diffRatio = diffRatio;
  }
}

export class StepTimeoutError extends ExecutionError {
  readonly kind = 'step_timeout';
  readonly stepNumber: number;
  readonly timeoutMs: number;

  constructor(stepNumber: number, timeoutMs: number) {
    super(`Step ${String(stepNumber)} exceeded ${String(timeoutMs)}ms`);
    this.name = 'StepTimeoutError';
    this.stepNumber = stepNumber;
    this.timeoutMs = timeoutMs;
  }
}

export class RunTimeoutError extends ExecutionError {
  readonly kind = 'run_timeout';
  readonly timeoutMs: number;

  constructor(timeoutMs: number, nextStep: number) {
    super(
      `Run exceeded ${String(timeoutMs)}ms before step ${String(nextStep)}`,
    );
    this.name = 'RunTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One-line failure reason for the run record: first line of the message,
 * whitespace collapsed, length bounded.
 */
export function toFailureReason(
  err: unknown,
  maxChars: number = LIMITS.MAX_REASON_CHARS,
): string {
  const firstLine = messageOf(err).split('\n')[0] ?? '';
  const collapsed = firstLine.replace(/\s+/g, ' ').trim();
  const reason = collapsed.length > 0 ? collapsed : 'Unknown execution error';
  return reason.length > maxChars ? `${reason.slice(0, maxChars - 3)}...` : reason;
}
