import { describe, it, expect } from 'vitest';
import { biasCorrect, encode, fuseScore, scoreShapes, shapeDifferences, toPercentages } from '../src/index.js';
import { makeCircle, makeStroke } from './fixtures/helpers.js';

const UNIT_WEIGHTS = { grid: 1, circle: 1, horizontal: 1, vertical: 1 };

describe('biasCorrect', () => {
  it('pulls a larger grid difference toward the circle difference', () => {
    // gap 8, bias 1 / 18
    const result = biasCorrect(10, 2);
    expect(result.circle).toBe(2);
    expect(result.grid).toBeCloseTo(2 + 8 / 18);
  });

  it('pulls a larger circle difference toward the grid difference', () => {
    // gap 2, bias 1 / 6
    const result = biasCorrect(1, 3);
    expect(result.grid).toBe(1);
    expect(result.circle).toBeCloseTo(1 + 2 / 6);
  });

  it('leaves equal differences alone and barely pulls across a wide gap', () => {
    expect(biasCorrect(0, 0)).toEqual({ grid: 0, circle: 0 });
    const wide = biasCorrect(0, 999);
    // 999 / (2 × 1000)
    expect(wide.circle).toBeCloseTo(0.4995);
  });
});

describe('fuseScore', () => {
  it('applies each weight to its own difference', () => {
    const diffs = { grid: 1, circle: 2, horizontal: 3, vertical: 4 };
    expect(fuseScore(diffs, UNIT_WEIGHTS)).toBe(10);
    expect(fuseScore(diffs, { grid: 2, circle: 0, horizontal: 1, vertical: 0.5 })).toBe(7);
  });
});

describe('scoreShapes', () => {
  it('is zero for a shape against itself', () => {
    const shape = encode(makeCircle(10, 10, 40), 5);
    expect(scoreShapes(shape, shape, UNIT_WEIGHTS)).toBe(0);
  });

  it('scales grid and circle MSEs by 100 and adds the flat differences', () => {
    const a = encode(makeStroke([[0, 0], [25, 0], [50, 0], [75, 0], [100, 0]]), 5);
    const b = encode(makeStroke([[0, 0], [0, 25], [0, 50], [0, 75], [0, 100]]), 5);
    const diffs = shapeDifferences(a, b);

    // Row 2 against column 2: eight cells differ by 0.2, so 100 × 0.32 / 25 before
    // bias correction, which can only lower the larger of grid and circle.
    expect(Math.min(diffs.grid, diffs.circle)).toBeLessThanOrEqual(1.28 + 1e-9);
    expect(diffs.grid).toBeGreaterThan(0);
    expect(scoreShapes(a, b, UNIT_WEIGHTS)).toBeCloseTo(diffs.grid + diffs.circle + diffs.horizontal + diffs.vertical);
  });
});

describe('toPercentages', () => {
  it('returns nothing for no scores', () => {
    expect(toPercentages([])).toEqual([]);
  });

  it('gives 100 to a perfect match and floors at the mean', () => {
    expect(toPercentages([0, 1, 2])).toEqual([100, 0, 0]);
    expect(toPercentages([1, 3])).toEqual([50, 0]);
  });

  it('treats a zero mean as 1', () => {
    expect(toPercentages([0, 0])).toEqual([100, 100]);
  });

  it('truncates to two decimals instead of rounding', () => {
    // 100 - 100 / 3 = 66.666...
    expect(toPercentages([1, 5])).toEqual([66.66, 0]);
  });
});
