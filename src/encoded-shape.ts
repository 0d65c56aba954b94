import type { Point, Bounds, CircleCenter, FlatAxis, EncodingConfig } from './types.js';
import type { CircleMap, FlatMap, GridMap, ResolvedEncoding } from './internal/types.js';
import { assertPrecision, resolveEncoding } from './internal/config.js';
import { centerOfMass, computeBounds, expandBounds, geometricMedian } from './internal/geometry.js';
import { buildGridMap } from './internal/grid-map.js';
import { buildCircleMap } from './internal/circle-map.js';
import { buildFlatMap } from './internal/flat-map.js';

type ReadonlyMatrix = ReadonlyArray<ReadonlyArray<number>>;

function freezeMatrix(matrix: number[][]): ReadonlyMatrix {
  return Object.freeze(matrix.map(row => Object.freeze(row)));
}

/**
 * Density-map encoding of one finished stroke.
 *
 * Holds four representations at a shared precision:
 * - grid map: precision × precision cells over the stroke's box
 * - circle maps: precision rings × 4 quadrants, around the centre of mass
 *   and around the geometric median
 * - flat maps: precision² bins of line-segment density along x and along y
 *
 * The original points are kept so the shape can be re-encoded with
 * {@link EncodedShape.setPrecision}. Nothing else mutates a shape.
 */
export class EncodedShape {
  /** Raw extrema of the source points. Never changes after construction. */
  readonly bounds: Readonly<Bounds>;
  readonly encoding: Readonly<ResolvedEncoding>;

  private readonly source: readonly Point[];
  private currentPrecision = 0;
  private grid: ReadonlyMatrix = [];
  private massCircle: ReadonlyMatrix = [];
  private medianCircle: ReadonlyMatrix = [];
  private horizontal: readonly number[] = [];
  private vertical: readonly number[] = [];

  constructor(points: readonly Point[], precision: number, encoding?: EncodingConfig) {
    this.source = Object.freeze(points.map(p => Object.freeze({ x: p.x, y: p.y })));
    this.bounds = Object.freeze(computeBounds(this.source));
    this.encoding = Object.freeze(resolveEncoding(encoding));
    this.setPrecision(precision);
  }

  /** Shared resolution of every map. */
  get precision(): number {
    return this.currentPrecision;
  }

  /** The stroke this shape was encoded from. */
  get points(): readonly Point[] {
    return this.source;
  }

  get pointCount(): number {
    return this.source.length;
  }

  /** gridMap()[row][column]; row 0 holds the lowest y values. */
  gridMap(): ReadonlyMatrix {
    return this.grid;
  }

  /** circleMap()[ring][quadrant]. Defaults to the median-centred map. */
  circleMap(center: CircleCenter = 'median'): ReadonlyMatrix {
    return center === 'median' ? this.medianCircle : this.massCircle;
  }

  flatMap(axis: FlatAxis): readonly number[] {
    return axis === 'horizontal' ? this.horizontal : this.vertical;
  }

  /** Re-encode every map at a new precision. Bounds are left untouched. */
  setPrecision(precision: number): void {
    assertPrecision(precision);

    const points = this.source;
    const box = expandBounds(this.bounds, this.encoding.minWidth, this.encoding.minHeight);

    const grid: GridMap = buildGridMap(points, box, precision);
    const massCircle: CircleMap = buildCircleMap(points, centerOfMass(points), precision, this.encoding.minRadius);
    const medianCircle: CircleMap = buildCircleMap(points, geometricMedian(points), precision, this.encoding.minRadius);
    const horizontal: FlatMap = buildFlatMap(points, box, precision, 'horizontal');
    const vertical: FlatMap = buildFlatMap(points, box, precision, 'vertical');

    this.currentPrecision = precision;
    this.grid = freezeMatrix(grid);
    this.massCircle = freezeMatrix(massCircle);
    this.medianCircle = freezeMatrix(medianCircle);
    this.horizontal = Object.freeze(horizontal);
    this.vertical = Object.freeze(vertical);
  }
}

/** Encode a stroke at the given precision. */
export function encode(points: readonly Point[], precision: number, encoding?: EncodingConfig): EncodedShape {
  return new EncodedShape(points, precision, encoding);
}
