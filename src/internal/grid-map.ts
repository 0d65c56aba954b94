import type { Point, Bounds } from '../types.js';
import type { GridMap } from './types.js';

/** A precision × precision matrix of zeros. */
function emptyGrid(precision: number): GridMap {
  return Array.from({ length: precision }, () => new Array<number>(precision).fill(0));
}

/**
 * Map a coordinate into one of `precision` equal slices of [min, max].
 * The max edge lands in the last slice; anything below range or not a number
 * (single-point strokes, degenerate boxes) lands in the middle slice.
 */
function cellIndex(value: number, min: number, max: number, precision: number): number {
  const idx = Math.trunc((value - min) / ((max - min) / precision));
  if (!Number.isFinite(idx) || idx < 0) return Math.floor(precision / 2);
  if (idx >= precision) return precision - 1;
  return idx;
}

/**
 * Density of points over a precision × precision partition of the working box.
 * Each cell holds (points in cell / total points).
 */
export function buildGridMap(points: readonly Point[], box: Bounds, precision: number): GridMap {
  const grid = emptyGrid(precision);
  if (points.length === 0) return grid;

  for (const p of points) {
    const row = cellIndex(p.y, box.bottom, box.top, precision);
    const col = cellIndex(p.x, box.left, box.right, precision);
    grid[row][col] += 1;
  }

  for (const row of grid) {
    for (let c = 0; c < precision; c++) {
      row[c] /= points.length;
    }
  }

  return grid;
}
