import type { CircleCenter, FlatAxis, QuadrantRange } from '../types.js';
import type { EncodedShape } from '../encoded-shape.js';
import { QUADRANT_COUNT } from './circle-map.js';

/** Returned when two shapes cannot be compared (missing or different precision). */
export const INCOMPARABLE_DIFFERENCE = 100;

const ALL_QUADRANTS: QuadrantRange = [0, QUADRANT_COUNT - 1];

type MaybeShape = EncodedShape | null | undefined;

function comparable(a: MaybeShape, b: MaybeShape): a is EncodedShape {
  return a != null && b != null && a.precision === b.precision;
}

/** Mean squared error between two grid maps. */
export function gridDifference(a: MaybeShape, b: MaybeShape): number {
  if (!comparable(a, b) || !b) return INCOMPARABLE_DIFFERENCE;

  const mapA = a.gridMap();
  const mapB = b.gridMap();
  const precision = a.precision;

  let total = 0;
  for (let r = 0; r < precision; r++) {
    for (let c = 0; c < precision; c++) {
      const diff = mapA[r][c] - mapB[r][c];
      total += diff * diff;
    }
  }

  return total / (precision * precision);
}

/**
 * Mean squared error between two circle maps.
 * Compares the median-centred maps unless told otherwise; `quadrants`
 * narrows the comparison to an inclusive range for directional checks.
 */
export function circleDifference(
  a: MaybeShape,
  b: MaybeShape,
  center: CircleCenter = 'median',
  quadrants: QuadrantRange = ALL_QUADRANTS,
): number {
  if (!comparable(a, b) || !b) return INCOMPARABLE_DIFFERENCE;

  const [first, last] = quadrants;
  if (!Number.isInteger(first) || !Number.isInteger(last) || first < 0 || last >= QUADRANT_COUNT || first > last) {
    return INCOMPARABLE_DIFFERENCE;
  }

  const mapA = a.circleMap(center);
  const mapB = b.circleMap(center);
  const rings = a.precision;

  let total = 0;
  for (let r = 0; r < rings; r++) {
    for (let q = first; q <= last; q++) {
      const diff = mapA[r][q] - mapB[r][q];
      total += diff * diff;
    }
  }

  return total / (rings * (last - first + 1));
}

/**
 * Smallest mismatch fraction between two flat maps over shifts of
 * -maxShift..maxShift bins.
 *
 * The unshifted comparison skips the two edge bins and weighs each mismatch
 * 1 / length. A shift of n compares the length - n overlapping bins and
 * weighs each mismatch 1 / (length - n).
 */
export function compareFlatMaps(mapA: readonly number[], mapB: readonly number[], maxShift: number): number {
  const length = Math.min(mapA.length, mapB.length);
  if (length === 0) return 0;

  let lowest = 0;
  for (let i = 1; i < length - 1; i++) {
    if (mapA[i] !== mapB[i]) lowest += 1 / length;
  }

  for (let n = 1; n <= maxShift && n < length; n++) {
    const overlap = length - n;
    let left = 0;
    let right = 0;

    for (let i = 0; i < overlap; i++) {
      if (mapA[i + n] !== mapB[i]) left += 1 / overlap;
      if (mapA[i] !== mapB[i + n]) right += 1 / overlap;
    }

    lowest = Math.min(lowest, left, right);
  }

  return lowest;
}

/** Shift-tolerant difference between two flat maps along one axis. */
export function flatDifference(
  a: MaybeShape,
  b: MaybeShape,
  axis: FlatAxis,
): number {
  if (!comparable(a, b) || !b) return INCOMPARABLE_DIFFERENCE;
  return compareFlatMaps(a.flatMap(axis), b.flatMap(axis), a.precision);
}
