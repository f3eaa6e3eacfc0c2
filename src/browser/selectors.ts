import type { Locator, Page } from 'playwright';

import type { SelectorHint } from '../schema/selector.js';

// ── Playwright mapping ────────────────────────────────────────

/**
 * Maps a resolved SelectorHint to a Playwright Locator.
 *
 *   testid      → [data-test="…"]
 *   id          → [id="…"]
 *   text        → exact text, first match
 *   placeholder → exact placeholder
 *   css         → raw selector (known-elements table only)
 *
 * Resolution order is decided by `resolveLocator`, not here.
 */
export function toPlaywrightLocator(page: Page, hint: SelectorHint): Locator {
  switch (hint.strategy) {
    case 'testid':
      return page.locator(`[data-test="${escapeAttribute(hint.value)}"]`);

    case 'id':
      return page.locator(`[id="${escapeAttribute(hint.value)}"]`);

    case 'text':
      // Exact match plus first() keeps repeated labels from tripping
      // Playwright's strict mode.
      return page.getByText(hint.value, { exact: true }).first();

    case 'placeholder':
      return page.getByPlaceholder(hint.value, { exact: true });

    case 'css':
      return page.locator(hint.value);
  }
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the selector for logs and reports. */
export function describeSelector(hint: SelectorHint): string {
  switch (hint.strategy) {
    case 'testid':
      return `[data-test="${hint.value}"]`;
    case 'id':
      return `#${hint.value}`;
    case 'text':
      return `text="${hint.value}"`;
    case 'placeholder':
      return `placeholder="${hint.value}"`;
    case 'css':
      return hint.value;
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/["\\]/g, '\\$&');
}
