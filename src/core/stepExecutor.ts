import type { ElementTarget, ExecutionPage } from '../browser/runner.js';
import { requireLocator } from '../browser/locator.js';
import { describeSelector } from '../browser/selectors.js';
import type { BlueprintElement, Step } from '../schema/job.js';
import type { VisualStatus } from '../schema/run.js';
import type { VisualRegressionEngine } from '../visual/engine.js';
import type { RunArtifacts } from './artifacts.js';
import {
  ElementNotVisibleError,
  LocatorNotFoundError,
  NavigationTimeoutError,
  StepTimeoutError,
  VerificationFailedError,
  VisualMismatchError,
  messageOf,
} from './errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface StepTimeouts {
  elementVisibleMs: number;
  navigationMs: number;
  networkIdleMs: number;
  stepMs: number;
}

/** Everything a step may touch. Scoped to one run. */
export interface StepContext {
  page: ExecutionPage;
  blueprint: readonly BlueprintElement[];
  dataset: Readonly<Record<string, string>>;
  knownElements: Readonly<Record<string, string>>;
  runIdentity: string;
  artifacts: Pick<RunArtifacts, 'recordVisualFailure'>;
}

export interface StepOutcome {
  status: 'PASS';
  /** Result of the visual check, or `N/A` for functional steps. */
  visualStatus: VisualStatus;
}

export interface StepExecutor {
  /** Run one step. Resolves on PASS; every failure rejects. */
  execute(step: Step, context: StepContext): Promise<StepOutcome>;
}

// ── Factory ──────────────────────────────────────────────────

export function createStepExecutor(
  visual: VisualRegressionEngine,
  timeouts: StepTimeouts,
): StepExecutor {
  async function perform(step: Step, ctx: StepContext): Promise<StepOutcome> {
    switch (step.action) {
      case 'ENTER_TEXT': {
        const target = await visibleTarget(step.target_element, ctx);
        const value =
          step.data_key !== undefined ? (ctx.dataset[step.data_key] ?? '') : '';
        await target.fill(value, { timeout: timeouts.elementVisibleMs });
        return functionalPass();
      }

      case 'CLICK': {
        const target = await visibleTarget(step.target_element, ctx);
        await target.click({ timeout: timeouts.elementVisibleMs });
        await settleAfterClick(ctx.page);
        if (step.verifications) {
          await verifyAfterClick(
            step.target_element,
            step.verifications.element_visible,
            ctx,
          );
        }
        return functionalPass();
      }

      case 'VERIFY_ELEMENT_VISIBLE':
        await visibleTarget(step.target_element, ctx);
        return functionalPass();

      case 'VISUAL_VALIDATION':
        return visualCheck(step.target_element, ctx);
    }
  }

  async function visibleTarget(
    targetName: string,
    ctx: StepContext,
  ): Promise<ElementTarget> {
    const selector = requireLocator(targetName, ctx.blueprint, ctx.knownElements);
    log.detail(`'${targetName}' → ${describeSelector(selector)}`);
    const target = ctx.page.target(selector);
    try {
      await target.waitFor({ state: 'visible', timeout: timeouts.elementVisibleMs });
    } catch (err) {
      throw new ElementNotVisibleError(targetName, timeouts.elementVisibleMs, err);
    }
    return target;
  }

  async function settleAfterClick(page: ExecutionPage): Promise<void> {
    try {
      await page.waitForLoad('domcontentloaded', timeouts.navigationMs);
    } catch (err) {
      throw new NavigationTimeoutError(page.url(), err);
    }
  }

  async function verifyAfterClick(
    clicked: string,
    expected: string,
    ctx: StepContext,
  ): Promise<void> {
    try {
      await visibleTarget(expected, ctx);
    } catch (err) {
      if (err instanceof LocatorNotFoundError) {
        throw new VerificationFailedError(clicked, expected, 'could not be located');
      }
      if (err instanceof ElementNotVisibleError) {
        throw new VerificationFailedError(
          clicked,
          expected,
          `was not visible within ${String(err.timeoutMs)}ms`,
        );
      }
      throw err;
    }
  }

  async function visualCheck(
    stepName: string,
    ctx: StepContext,
  ): Promise<StepOutcome> {
    // Animations and late requests are the usual source of false diffs.
    // An idle timeout is not a failure; the comparison decides.
    try {
      await ctx.page.waitForLoad('networkidle', timeouts.networkIdleMs);
    } catch (err) {
      log.detail(`Network did not go idle before '${stepName}': ${messageOf(err)}`);
    }

    const outcome = await visual.check(
      ctx.page,
      ctx.runIdentity,
      stepName,
      ctx.artifacts,
    );
    if (outcome.result === 'FAIL') {
      throw new VisualMismatchError(stepName, outcome.diffRatio ?? 1);
    }
    return { status: 'PASS', visualStatus: outcome.result };
  }

  return {
    execute(step: Step, context: StepContext): Promise<StepOutcome> {
      return withDeadline(
        perform(step, context),
        timeouts.stepMs,
        () => new StepTimeoutError(step.step_number, timeouts.stepMs),
      );
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function functionalPass(): StepOutcome {
  return { status: 'PASS', visualStatus: 'N/A' };
}

/**
 * Bounded wait on a step. A step that overruns is abandoned; the run's
 * browser is closed by the controller, which settles the abandoned work.
 */
async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } catch (err) {
    if (err instanceof StepTimeoutError) {
      void work.catch((late: unknown) => {
        log.detail(`Abandoned step settled late: ${messageOf(late)}`);
      });
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
