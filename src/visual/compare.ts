import pixelmatch from 'pixelmatch';
import { PNG } from 'pngjs';

// ── Public types ─────────────────────────────────────────────

export interface CompareOptions {
  /** Per-pixel colour distance tolerance, 0..1 (pixelmatch `threshold`). */
  pixelThreshold: number;
  /** Share of differing pixels still treated as equal, 0..1. */
  maxDiffPixelRatio: number;
}

export type CompareResult =
  | { match: boolean; reason: 'compared'; diffPixels: number; diffRatio: number }
  | { match: false; reason: 'dimensions'; diffPixels: number; diffRatio: 1 };

// ── Comparison ───────────────────────────────────────────────

/**
 * Pixel-compare two PNG images. Anti-aliased pixels are ignored by
 * pixelmatch; a size change is always a mismatch.
 */
export function comparePng(
  baseline: Buffer,
  current: Buffer,
  options: CompareOptions,
): CompareResult {
  const expected = PNG.sync.read(baseline);
  const actual = PNG.sync.read(current);

  if (expected.width !== actual.width || expected.height !== actual.height) {
    return {
      match: false,
      reason: 'dimensions',
      diffPixels: Math.max(
        expected.width * expected.height,
        actual.width * actual.height,
      ),
      diffRatio: 1,
    };
  }

  const { width, height } = expected;
  const diffPixels = pixelmatch(expected.data, actual.data, null, width, height, {
    threshold: options.pixelThreshold,
  });
  const total = width * height;
  const diffRatio = total === 0 ? 0 : diffPixels / total;

  return {
    match: diffRatio <= options.maxDiffPixelRatio,
    reason: 'compared',
    diffPixels,
    diffRatio,
  };
}
