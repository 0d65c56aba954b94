import type { MapWeights, ShapeDifferences } from '../types.js';
import type { EncodedShape } from '../encoded-shape.js';
import { circleDifference, flatDifference, gridDifference } from './compare.js';

/** Grid and circle MSEs are scaled up to sit beside flat-map mismatch fractions. */
const MSE_SCALE = 100;

/**
 * Pull the larger of the grid and circle differences toward the smaller.
 *
 * Both maps describe 2-D density, so a large disagreement between them is
 * mostly noise. The pull is 1 / (2 × (1 + gap)): strong for small gaps,
 * fading as the gap grows.
 */
export function biasCorrect(grid: number, circle: number): { grid: number; circle: number } {
  if (circle < grid) {
    const gap = grid - circle;
    const bias = 1 / (2 * (1 + gap));
    return { grid: circle + gap * bias, circle };
  }

  if (grid < circle) {
    const gap = circle - grid;
    const bias = 1 / (2 * (1 + gap));
    return { grid, circle: grid + gap * bias };
  }

  return { grid, circle };
}

/** The four differences between two shapes, grid and circle bias-corrected. */
export function shapeDifferences(a: EncodedShape, b: EncodedShape): ShapeDifferences {
  const corrected = biasCorrect(
    MSE_SCALE * gridDifference(a, b),
    MSE_SCALE * circleDifference(a, b, 'median'),
  );

  return {
    grid: corrected.grid,
    circle: corrected.circle,
    horizontal: flatDifference(a, b, 'horizontal'),
    vertical: flatDifference(a, b, 'vertical'),
  };
}

/** Weighted sum of the four differences. */
export function fuseScore(diffs: ShapeDifferences, weights: MapWeights): number {
  return diffs.horizontal * weights.horizontal
    + diffs.vertical * weights.vertical
    + diffs.circle * weights.circle
    + diffs.grid * weights.grid;
}

/** Raw score between two shapes. Lower is a closer match. */
export function scoreShapes(a: EncodedShape, b: EncodedShape, weights: MapWeights): number {
  return fuseScore(shapeDifferences(a, b), weights);
}

/**
 * Turn raw scores into confidence percentages relative to their mean.
 * percent = 100 - 100 × min(score / mean, 1), truncated to two decimals.
 * A zero mean is treated as 1.
 */
export function toPercentages(scores: readonly number[]): number[] {
  if (scores.length === 0) return [];

  let total = 0;
  for (const s of scores) total += s;

  let mean = total / scores.length;
  if (mean === 0) mean = 1;

  return scores.map(score => {
    const ratio = Math.min(score / mean, 1);
    return Math.trunc((100 - 100 * ratio) * 100) / 100;
  });
}
