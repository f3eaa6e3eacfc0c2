import type { BlueprintElement } from '../schema/job.js';
import type { SelectorHint, SelectorStrategy } from '../schema/selector.js';
import { LocatorNotFoundError } from '../core/errors.js';

// ── Resolution result ────────────────────────────────────────

export type LocatorResolution =
  | { found: true; selector: SelectorHint; source: 'blueprint' | 'known' }
  | { found: false; targetName: string };

// ── Known elements ───────────────────────────────────────────
// Elements that only exist after navigation and so never appear in a
// blueprint crawled from the entry page.

export const KNOWN_ELEMENTS: Readonly<Record<string, string>> = {
  inventory_list: '.inventory_list',
  inventory_container: '#inventory_container',
  shopping_cart: '.shopping_cart_link',
  page_title: '.title',
  app_logo: '.app_logo',
  error_message: '[data-test="error"]',
};

// ── Strategies ───────────────────────────────────────────────

interface LocatorStrategy {
  strategy: SelectorStrategy;
  pick(element: BlueprintElement): string | undefined;
}

/** Evaluated in order; the first strategy that yields a value wins. */
export const LOCATOR_STRATEGIES: readonly LocatorStrategy[] = [
  { strategy: 'testid', pick: (el) => nonEmpty(el.data_test) },
  { strategy: 'id', pick: (el) => nonEmpty(el.id) },
  { strategy: 'text', pick: (el) => nonEmpty(el.text) },
  { strategy: 'placeholder', pick: (el) => nonEmpty(el.placeholder) },
];

// ── Resolver ─────────────────────────────────────────────────

/**
 * Turn a logical name into a concrete selector. Pure: no page access,
 * no retries. Waiting for the element is the step executor's job.
 */
export function resolveLocator(
  targetName: string,
  blueprint: readonly BlueprintElement[],
  knownElements: Readonly<Record<string, string>> = KNOWN_ELEMENTS,
): LocatorResolution {
  const element = blueprint.find((el) => el.logical_name === targetName);

  // The known-elements table only covers names the blueprint lacks.
  if (element) {
    for (const { strategy, pick } of LOCATOR_STRATEGIES) {
      const value = pick(element);
      if (value !== undefined) {
        return { found: true, selector: { strategy, value }, source: 'blueprint' };
      }
    }
    return { found: false, targetName };
  }

  const known = knownElements[targetName];
  if (known !== undefined) {
    return {
      found: true,
      selector: { strategy: 'css', value: known },
      source: 'known',
    };
  }

  return { found: false, targetName };
}

/** Like `resolveLocator`, but throws `LocatorNotFoundError` on a miss. */
export function requireLocator(
  targetName: string,
  blueprint: readonly BlueprintElement[],
  knownElements?: Readonly<Record<string, string>>,
): SelectorHint {
  const resolution = resolveLocator(targetName, blueprint, knownElements);
  if (!resolution.found) {
    throw new LocatorNotFoundError(targetName);
  }
  return resolution.selector;
}

// ── Helpers ──────────────────────────────────────────────────

function nonEmpty(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
