import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { chromium } from 'playwright';
import type { BrowserContext, Locator, Page } from 'playwright';

import type { SelectorHint } from '../schema/selector.js';
import { NavigationTimeoutError } from '../core/errors.js';
import { toPlaywrightLocator } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

/** The slice of a Playwright Locator the step executor drives. */
export type ElementTarget = Pick<Locator, 'waitFor' | 'fill' | 'click'>;

export type LoadState = 'domcontentloaded' | 'networkidle';

export interface ExecutionPage {
  target(selector: SelectorHint): ElementTarget;
  screenshot(): Promise<Buffer>;
  waitForLoad(state: LoadState, timeoutMs: number): Promise<void>;
  url(): string;
}

export interface SessionOptions {
  headless: boolean;
  slowMoMs: number;
  tracing: boolean;
  container: boolean;
}

export interface BrowserSession {
  readonly page: ExecutionPage;
  readonly tracing: boolean;
  open(url: string, timeoutMs: number): Promise<void>;
  /** Stop tracing and return the trace archive, if tracing was on. */
  stopTrace(): Promise<Buffer | undefined>;
  close(): Promise<void>;
}

export type SessionLauncher = (options: SessionOptions) => Promise<BrowserSession>;

// Chromium refuses to start as root inside most containers without these.
const CONTAINER_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
];

// ── Session launcher ─────────────────────────────────────────

/**
 * Launch an isolated browser (own browser, own context) for one run.
 * Headed with slow-mo when the run is being watched live.
 */
export const launchSession: SessionLauncher = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless,
    slowMo: options.headless ? 0 : options.slowMoMs,
    ...(options.container ? { args: CONTAINER_ARGS } : {}),
  });

  try {
    const context = await browser.newContext();
    if (options.tracing) {
      await context.tracing.start({ screenshots: true, snapshots: true });
    }
    const page = await context.newPage();
    let traceStopped = false;

    return {
      page: wrapPage(page),
      tracing: options.tracing,

      async open(url: string, timeoutMs: number): Promise<void> {
        try {
          await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
        } catch (err) {
          throw new NavigationTimeoutError(url, err);
        }
      },

      async stopTrace(): Promise<Buffer | undefined> {
        if (!options.tracing || traceStopped) return undefined;
        traceStopped = true;
        return readTrace(context);
      },

      async close(): Promise<void> {
        await browser.close();
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
};

// ── Page adapter ─────────────────────────────────────────────

function wrapPage(page: Page): ExecutionPage {
  return {
    target(selector: SelectorHint): ElementTarget {
      return toPlaywrightLocator(page, selector);
    },

    screenshot(): Promise<Buffer> {
      return page.screenshot({ fullPage: true });
    },

    async waitForLoad(state: LoadState, timeoutMs: number): Promise<void> {
      await page.waitForLoadState(state, { timeout: timeoutMs });
    },

    url(): string {
      return page.url();
    },
  };
}

// ── Tracing ──────────────────────────────────────────────────

async function readTrace(context: BrowserContext): Promise<Buffer> {
  const dir = await mkdtemp(path.join(tmpdir(), 'uiverify-trace-'));
  const tracePath = path.join(dir, 'trace.zip');
  try {
    await context.tracing.stop({ path: tracePath });
    return await readFile(tracePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
