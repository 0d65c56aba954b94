// Core
export { Recognizer, recognize, DEFAULT_CONFIG } from './recognizer.js';
export { MatchLibrary, EMPTY_ENTRY_NAME } from './match-library.js';
export { EncodedShape, encode } from './encoded-shape.js';
export { toSnapshot, fromSnapshot, parseSnapshot, SNAPSHOT_VERSION } from './snapshot.js';
export { DEFAULT_ENCODING, DEFAULT_LIBRARY_OPTIONS } from './internal/config.js';

// Geometry
export { centerOfMass, geometricMedian, computeBounds, distance } from './internal/geometry.js';

// Comparison and scoring
export {
  gridDifference,
  circleDifference,
  flatDifference,
  INCOMPARABLE_DIFFERENCE,
} from './internal/compare.js';
export { biasCorrect, fuseScore, scoreShapes, shapeDifferences, toPercentages } from './internal/scoring.js';

// Debug previews
export { generateGridMapSvg, generateCircleMapSvg } from './internal/svg-generator.js';

// Types
export type { LabeledEntry } from './match-library.js';
export type {
  Point,
  Bounds,
  CircleCenter,
  FlatAxis,
  QuadrantRange,
  EncodingConfig,
  MapWeights,
  ShapeDifferences,
  LibraryOptions,
  RecognizerConfig,
  RankedMatch,
  RecognitionRecord,
  EntrySnapshot,
  LibrarySnapshot,
} from './types.js';
