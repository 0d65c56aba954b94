import type { Point, Bounds, FlatAxis } from '../types.js';
import type { FlatMap, LineSegment } from './types.js';
import { distance } from './geometry.js';

/** Fraction of the perpendicular extent above which a jump starts a new segment. */
const GAP_RATIO = 1 / 6;

function coordinate(p: Point, axis: FlatAxis): number {
  return axis === 'horizontal' ? p.x : p.y;
}

/**
 * Reduce a stroke to straight runs along one axis.
 *
 * A run ends at point i when the next two points both move against the
 * current trend, or when the jump to point i + 1 exceeds a sixth of the
 * box's perpendicular extent. The next run starts at point i + 1 with the
 * trend flipped. Strokes of three points or fewer give a single run.
 */
export function segmentStroke(points: readonly Point[], box: Bounds, axis: FlatAxis): LineSegment[] {
  if (points.length === 0) return [];

  const first = coordinate(points[0], axis);
  const last = coordinate(points[points.length - 1], axis);
  if (points.length <= 3) {
    return [{ start: first, end: last }];
  }

  const perpendicular = axis === 'horizontal' ? box.top - box.bottom : box.right - box.left;
  const maxGap = perpendicular * GAP_RATIO;

  const segments: LineSegment[] = [];
  let start = first;
  let increasing = coordinate(points[2], axis) > first;

  for (let i = 0; i < points.length - 2; i++) {
    const here = coordinate(points[i], axis);
    const next = coordinate(points[i + 1], axis);
    const after = coordinate(points[i + 2], axis);

    const reverses = increasing
      ? next < here && after < here
      : next > here && after > here;
    const jumps = distance(points[i], points[i + 1]) > maxGap;

    if (reverses || jumps) {
      segments.push({ start, end: here });
      start = next;
      increasing = !increasing;
    }
  }

  segments.push({ start, end: last });
  return segments;
}

/**
 * Count, for each of precision² equal slices of the box along the axis,
 * how many segments touch that slice. Slices and segments are closed
 * intervals, so a segment ending on a slice boundary counts for both sides.
 */
export function buildFlatMap(
  points: readonly Point[],
  box: Bounds,
  precision: number,
  axis: FlatAxis,
): FlatMap {
  const length = precision * precision;
  const map: FlatMap = new Array<number>(length).fill(0);
  if (points.length < 2) return map;

  const segments = segmentStroke(points, box, axis);
  const min = axis === 'horizontal' ? box.left : box.bottom;
  const max = axis === 'horizontal' ? box.right : box.top;
  const binWidth = (max - min) / length;

  for (let i = 0; i < length; i++) {
    const binStart = min + i * binWidth;
    const binEnd = min + (i + 1) * binWidth;

    for (const seg of segments) {
      const lo = Math.min(seg.start, seg.end);
      const hi = Math.max(seg.start, seg.end);
      if (lo <= binEnd && hi >= binStart) {
        map[i]++;
      }
    }
  }

  return map;
}
