import type { Point } from '../../src/types.js';

export function makePoint(x: number, y: number): Point {
  return { x, y };
}

/** Create a stroke (array of points) from coordinate pairs. */
export function makeStroke(coords: [number, number][]): Point[] {
  return coords.map(([x, y]) => makePoint(x, y));
}

/** Evenly spaced points from (x1, y1) to (x2, y2), both ends included. */
export function makeLine(x1: number, y1: number, x2: number, y2: number, numPoints: number = 21): Point[] {
  const points: Point[] = [];
  for (let i = 0; i < numPoints; i++) {
    const t = i / (numPoints - 1);
    points.push(makePoint(x1 + (x2 - x1) * t, y1 + (y2 - y1) * t));
  }
  return points;
}

/** Points around a circle, starting at angle 0 and going counter-clockwise. */
export function makeCircle(cx: number, cy: number, r: number, numPoints: number = 36): Point[] {
  const points: Point[] = [];
  for (let i = 0; i < numPoints; i++) {
    const a = (2 * Math.PI * i) / numPoints;
    points.push(makePoint(cx + r * Math.cos(a), cy + r * Math.sin(a)));
  }
  return points;
}

/** A "V": down from (x, y) to the bottom tip, then back up. */
export function makeV(x: number, y: number, size: number = 100, numPoints: number = 21): Point[] {
  const down = makeLine(x, y, x + size / 2, y - size, numPoints);
  const up = makeLine(x + size / 2, y - size, x + size, y, numPoints);
  return [...down, ...up.slice(1)];
}

/** Sum of every cell of a matrix. */
export function sumMatrix(matrix: ReadonlyArray<ReadonlyArray<number>>): number {
  let total = 0;
  for (const row of matrix) {
    for (const v of row) total += v;
  }
  return total;
}
