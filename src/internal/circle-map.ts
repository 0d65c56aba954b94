import type { Point } from '../types.js';
import type { CircleMap } from './types.js';
import { distance } from './geometry.js';

export const QUADRANT_COUNT = 4;

/** A rings × 4 matrix of zeros. */
function emptyCircle(rings: number): CircleMap {
  return Array.from({ length: rings }, () => new Array<number>(QUADRANT_COUNT).fill(0));
}

/**
 * Quadrant of a point around a centre.
 * 0: (+x, +y), 1: (+x, -y), 2: (-x, -y), 3: (-x, +y). Zero counts as positive.
 */
function quadrantOf(point: Point, center: Point): number {
  const xPositive = point.x - center.x >= 0;
  const yPositive = point.y - center.y >= 0;

  if (xPositive) return yPositive ? 0 : 1;
  return yPositive ? 3 : 2;
}

/**
 * Density of points over concentric rings split into quadrants.
 *
 * The outer radius is the distance to the furthest point, but never less
 * than minRadius, so tight clusters still spread over a usable circle.
 */
export function buildCircleMap(
  points: readonly Point[],
  center: Point,
  rings: number,
  minRadius: number,
): CircleMap {
  const circle = emptyCircle(rings);
  if (points.length === 0) return circle;

  let radius = 0;
  for (const p of points) {
    radius = Math.max(radius, distance(p, center));
  }
  radius = Math.max(radius, minRadius);

  const ringWidth = radius / rings;

  for (const p of points) {
    let ring = Math.trunc(distance(p, center) / ringWidth);
    if (ring >= rings) ring = rings - 1;
    circle[ring][quadrantOf(p, center)] += 1;
  }

  for (const ring of circle) {
    for (let q = 0; q < QUADRANT_COUNT; q++) {
      ring[q] /= points.length;
    }
  }

  return circle;
}
