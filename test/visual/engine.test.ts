import { describe, it, expect, vi } from 'vitest';

import { createMemoryStore } from '../../src/store/memory.js';
import { createVisualEngine } from '../../src/visual/engine.js';
import { ALTERED_PAGE, WHITE_PAGE } from '../helpers/fakes.js';

const options = { pixelThreshold: 0.1, maxDiffPixelRatio: 0.001 };
const KEY = 'baselines/tc-1/default/login-page.png';

function pageShowing(screen: Buffer) {
  return { screenshot: vi.fn(async () => screen) };
}

describe('visual engine', () => {
  it('creates a baseline on first sight and passes against it afterwards', async () => {
    const store = createMemoryStore();
    const engine = createVisualEngine(store, options);

    const first = await engine.check(pageShowing(WHITE_PAGE), 'tc-1/default', 'Login Page');
    expect(first).toEqual({ result: 'BASELINE_CREATED', baselineKey: KEY });
    expect(store.objects.get(KEY)?.contentType).toBe('image/png');

    const second = await engine.check(pageShowing(WHITE_PAGE), 'tc-1/default', 'Login Page');
    expect(second).toEqual({ result: 'PASS', baselineKey: KEY, diffRatio: 0 });
  });

  it('fails on a changed page, records one diff artifact and keeps the baseline', async () => {
    const store = createMemoryStore();
    await store.put(KEY, WHITE_PAGE, 'image/png');
    const engine = createVisualEngine(store, options);
    const artifacts = { recordVisualFailure: vi.fn(async () => {}) };

    const outcome = await engine.check(
      pageShowing(ALTERED_PAGE),
      'tc-1/default',
      'Login Page',
      artifacts,
    );

    expect(outcome).toEqual({ result: 'FAIL', baselineKey: KEY, diffRatio: 0.25 });
    expect(artifacts.recordVisualFailure).toHaveBeenCalledTimes(1);
    expect(artifacts.recordVisualFailure).toHaveBeenCalledWith(ALTERED_PAGE);
    expect(store.objects.get(KEY)?.body.equals(WHITE_PAGE)).toBe(true);
  });

  it('propagates store errors', async () => {
    const engine = createVisualEngine(
      {
        get: async () => {
          throw new Error('bucket offline');
        },
        put: async () => {},
      },
      options,
    );

    await expect(
      engine.check(pageShowing(WHITE_PAGE), 'tc-1/default', 'home'),
    ).rejects.toThrow('bucket offline');
  });
});
