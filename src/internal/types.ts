/**
 * A straight run of a stroke projected onto one axis.
 * start/end keep drawing order, so start may be greater than end.
 */
export interface LineSegment {
  start: number;
  end: number;
}

/** grid[row][column], row 0 at the bottom of the working box. */
export type GridMap = number[][];

/** circle[ring][quadrant], ring 0 innermost. */
export type CircleMap = number[][];

/** Segment count per bin along one axis. */
export type FlatMap = number[];

/** Encoding config with all defaults applied. */
export interface ResolvedEncoding {
  minWidth: number;
  minHeight: number;
  minRadius: number;
}

/** Library options with all defaults applied. */
export interface ResolvedLibraryOptions extends ResolvedEncoding {
  precision: number;
  gridWeight: number;
  circleWeight: number;
  horizontalWeight: number;
  verticalWeight: number;
  debug: boolean;
}

/** Recognizer config with all defaults applied. */
export interface ResolvedConfig extends ResolvedLibraryOptions {
  historySize: number;
}
