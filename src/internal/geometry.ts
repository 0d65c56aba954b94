import type { Point, Bounds } from '../types.js';

/** Weiszfeld iteration cap. */
const MEDIAN_MAX_ITERATIONS = 500;

/** Stop once successive estimates move less than this. */
const MEDIAN_TOLERANCE = 0.001;

/** Euclidean distance between two points. */
export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Mean of all coordinates. The origin for an empty sequence. */
export function centerOfMass(points: readonly Point[]): Point {
  if (points.length === 0) {
    return { x: 0, y: 0 };
  }

  let sumX = 0, sumY = 0;
  for (const p of points) {
    sumX += p.x;
    sumY += p.y;
  }

  return { x: sumX / points.length, y: sumY / points.length };
}

/**
 * Approximate the geometric median with Weiszfeld's algorithm.
 *
 * Starts from the centre of mass and replaces the estimate with the
 * inverse-distance weighted mean of all points until it moves less than
 * {@link MEDIAN_TOLERANCE} or {@link MEDIAN_MAX_ITERATIONS} is reached.
 * Points sitting exactly on the estimate are left out of that iteration.
 */
export function geometricMedian(points: readonly Point[]): Point {
  if (points.length < 2) {
    return centerOfMass(points);
  }

  let estimate = centerOfMass(points);

  for (let i = 0; i < MEDIAN_MAX_ITERATIONS; i++) {
    let numX = 0, numY = 0, denominator = 0;

    for (const p of points) {
      const d = distance(estimate, p);
      if (d === 0) continue;
      numX += p.x / d;
      numY += p.y / d;
      denominator += 1 / d;
    }

    // Every point coincides with the estimate: it is the median.
    if (denominator === 0) {
      return estimate;
    }

    const next = { x: numX / denominator, y: numY / denominator };
    if (distance(estimate, next) < MEDIAN_TOLERANCE) {
      return next;
    }
    estimate = next;
  }

  return estimate;
}

/** Extrema of a point sequence in a single pass. */
export function computeBounds(points: readonly Point[]): Bounds {
  if (points.length === 0) {
    return { left: 0, right: 0, top: 0, bottom: 0 };
  }

  let left = Infinity, right = -Infinity;
  let top = -Infinity, bottom = Infinity;

  for (const p of points) {
    left = Math.min(left, p.x);
    right = Math.max(right, p.x);
    top = Math.max(top, p.y);
    bottom = Math.min(bottom, p.y);
  }

  return { left, right, top, bottom };
}

/**
 * Grow bounds symmetrically about their midpoints until they are at least
 * minWidth wide and minHeight tall.
 */
export function expandBounds(bounds: Bounds, minWidth: number, minHeight: number): Bounds {
  let { left, right, top, bottom } = bounds;

  if (right - left < minWidth) {
    const mid = (left + right) / 2;
    left = mid - minWidth / 2;
    right = mid + minWidth / 2;
  }

  if (top - bottom < minHeight) {
    const mid = (top + bottom) / 2;
    bottom = mid - minHeight / 2;
    top = mid + minHeight / 2;
  }

  return { left, right, top, bottom };
}
