import type { EncodingConfig, LibraryOptions, RecognizerConfig } from '../types.js';
import type { ResolvedEncoding, ResolvedLibraryOptions, ResolvedConfig } from './types.js';

/** Default encoding minimums, tuned for input spanning roughly 1200 × 800 units. */
export const DEFAULT_ENCODING: Readonly<Required<EncodingConfig>> = {
  minWidth: 50,
  minHeight: 50,
  minRadius: 25,
};

/** Default library options. */
export const DEFAULT_LIBRARY_OPTIONS: Readonly<Required<LibraryOptions>> = {
  ...DEFAULT_ENCODING,
  precision: 5,
  gridWeight: 1.0,
  circleWeight: 1.0,
  horizontalWeight: 1.0,
  verticalWeight: 1.0,
  debug: false,
};

/** Default recognizer configuration. */
export const DEFAULT_CONFIG: Readonly<Required<RecognizerConfig>> = {
  ...DEFAULT_LIBRARY_OPTIONS,
  historySize: 10,
};

export function assertPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < 1) {
    throw new RangeError(`precision must be a positive integer, got ${precision}`);
  }
}

export function assertWeight(label: string, weight: number): void {
  if (!Number.isFinite(weight) || weight < 0) {
    throw new RangeError(`${label} must be a finite non-negative number, got ${weight}`);
  }
}

function assertPositive(label: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${label} must be a finite positive number, got ${value}`);
  }
}

/** Resolve a partial encoding config into a full one with defaults. */
export function resolveEncoding(config?: EncodingConfig): ResolvedEncoding {
  const resolved = {
    minWidth: config?.minWidth ?? DEFAULT_ENCODING.minWidth,
    minHeight: config?.minHeight ?? DEFAULT_ENCODING.minHeight,
    minRadius: config?.minRadius ?? DEFAULT_ENCODING.minRadius,
  };
  assertPositive('minWidth', resolved.minWidth);
  assertPositive('minHeight', resolved.minHeight);
  assertPositive('minRadius', resolved.minRadius);
  return resolved;
}

/** Resolve partial library options into full options with defaults. */
export function resolveLibraryOptions(options?: LibraryOptions): ResolvedLibraryOptions {
  const resolved = { ...DEFAULT_LIBRARY_OPTIONS, ...options, ...resolveEncoding(options) };
  assertPrecision(resolved.precision);
  assertWeight('gridWeight', resolved.gridWeight);
  assertWeight('circleWeight', resolved.circleWeight);
  assertWeight('horizontalWeight', resolved.horizontalWeight);
  assertWeight('verticalWeight', resolved.verticalWeight);
  return resolved;
}

/** Resolve a partial recognizer config into a full config with defaults. */
export function resolveConfig(config?: RecognizerConfig): ResolvedConfig {
  const historySize = config?.historySize ?? DEFAULT_CONFIG.historySize;
  if (!Number.isInteger(historySize) || historySize < 0) {
    throw new RangeError(`historySize must be a non-negative integer, got ${historySize}`);
  }
  return { ...resolveLibraryOptions(config), historySize };
}
