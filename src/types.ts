/** A single point of a drawn stroke. */
export interface Point {
  /** X coordinate in input units (canvas pixels or world units). */
  x: number;
  /** Y coordinate in input units. Larger values are "up". */
  y: number;
}

/** Extrema of a point sequence. All zero for an empty sequence. */
export interface Bounds {
  left: number;
  right: number;
  /** Largest y. */
  top: number;
  /** Smallest y. */
  bottom: number;
}

/** Which centre a circle map is built around. */
export type CircleCenter = 'median' | 'mass';

/** Axis a flat map projects onto. */
export type FlatAxis = 'horizontal' | 'vertical';

/** Inclusive, 0-based range of circle map quadrants. */
export type QuadrantRange = readonly [first: number, last: number];

/** Minimum geometry enforced while encoding, in input units. */
export interface EncodingConfig {
  /** Minimum width of the working box for grid and flat maps. Default: 50 */
  minWidth?: number;
  /** Minimum height of the working box for grid and flat maps. Default: 50 */
  minHeight?: number;
  /** Minimum outer radius of the circle maps. Default: 25 */
  minRadius?: number;
}

/** Per-representation weights applied when fusing differences. */
export interface MapWeights {
  grid: number;
  circle: number;
  horizontal: number;
  vertical: number;
}

/** The four raw differences between two shapes, after bias correction. */
export interface ShapeDifferences {
  /** 100 × grid MSE. */
  grid: number;
  /** 100 × median circle MSE. */
  circle: number;
  horizontal: number;
  vertical: number;
}

/** Optional tuning knobs for a MatchLibrary. */
export interface LibraryOptions extends EncodingConfig {
  /** Resolution of every map of the reserved entry and of learned entries. Default: 5 */
  precision?: number;
  /** Default: 1 */
  gridWeight?: number;
  /** Default: 1 */
  circleWeight?: number;
  /** Default: 1 */
  horizontalWeight?: number;
  /** Default: 1 */
  verticalWeight?: number;
  /** Log per-entry scores to the console while ranking. Default: false */
  debug?: boolean;
}

/** Optional tuning knobs, set on the Recognizer constructor. */
export interface RecognizerConfig extends LibraryOptions {
  /** Number of recognition results kept in the history. Default: 10 */
  historySize?: number;
}

/** One ranked library entry. */
export interface RankedMatch {
  /** Name of the matched entry. */
  name: string;
  /** Weighted, bias-corrected difference. Lower is closer. */
  score: number;
  /**
   * Confidence in [0, 100], truncated to two decimals.
   * 100 is a perfect match; anything at or above the library's mean score is 0.
   */
  percent: number;
}

/** A past call to Recognizer.recognize(). */
export interface RecognitionRecord {
  /** Library the stroke was matched against. */
  library: string;
  /** Best match, or null when the library was empty. */
  match: RankedMatch | null;
  /** Number of points in the recognized stroke. */
  pointCount: number;
}

/** Serialized library entry. Maps are rebuilt from the points on load. */
export interface EntrySnapshot {
  name: string;
  points: Point[];
}

/** JSON-compatible form of a MatchLibrary. */
export interface LibrarySnapshot {
  version: 1;
  name: string;
  precision: number;
  weights: MapWeights;
  /** Encoding minimums the entries were built with. Defaults apply when absent. */
  encoding?: Required<EncodingConfig>;
  entries: EntrySnapshot[];
}
