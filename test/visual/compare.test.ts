import { describe, it, expect } from 'vitest';

import { comparePng } from '../../src/visual/compare.js';
import { ALTERED_PAGE, WHITE_PAGE, solidPng } from '../helpers/fakes.js';

const options = { pixelThreshold: 0.1, maxDiffPixelRatio: 0.001 };

describe('comparePng', () => {
  it('matches identical images', () => {
    expect(comparePng(WHITE_PAGE, WHITE_PAGE, options)).toEqual({
      match: true,
      reason: 'compared',
      diffPixels: 0,
      diffRatio: 0,
    });
  });

  it('counts differing pixels', () => {
    const result = comparePng(WHITE_PAGE, ALTERED_PAGE, options);

    expect(result).toEqual({
      match: false,
      reason: 'compared',
      diffPixels: 100,
      diffRatio: 0.25,
    });
  });

  it('tolerates differences up to maxDiffPixelRatio', () => {
    const result = comparePng(WHITE_PAGE, ALTERED_PAGE, {
      ...options,
      maxDiffPixelRatio: 0.25,
    });

    expect(result.match).toBe(true);
  });

  it('treats a size change as a mismatch', () => {
    const smaller = solidPng(10, 10, [255, 255, 255]);

    expect(comparePng(WHITE_PAGE, smaller, options)).toEqual({
      match: false,
      reason: 'dimensions',
      diffPixels: 400,
      diffRatio: 1,
    });
  });
});
