import type { Point, EncodingConfig, LibraryOptions, LibrarySnapshot, EntrySnapshot, MapWeights } from './types.js';
import { EMPTY_ENTRY_NAME, MatchLibrary } from './match-library.js';
import { DEFAULT_LIBRARY_OPTIONS } from './internal/config.js';

export const SNAPSHOT_VERSION = 1;

/**
 * Plain, JSON-compatible copy of a library. Maps are not stored; points and
 * the library's encoding minimums are. The debug flag is not stored.
 */
export function toSnapshot(library: MatchLibrary): LibrarySnapshot {
  const { minWidth, minHeight, minRadius } = library.options;
  return {
    version: SNAPSHOT_VERSION,
    name: library.name,
    precision: library.precision,
    weights: { ...library.weights },
    encoding: { minWidth, minHeight, minRadius },
    entries: library.entries().map(entry => ({
      name: entry.name,
      points: entry.shape.points.map(p => ({ x: p.x, y: p.y })),
    })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, key: string, where: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TypeError(`${where}.${key} must be a finite number`);
  }
  return value;
}

function readString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new TypeError(`${where}.${key} must be a string`);
  }
  return value;
}

function readPositive(record: Record<string, unknown>, key: string, where: string): number {
  const value = readNumber(record, key, where);
  if (value <= 0) {
    throw new TypeError(`${where}.${key} must be positive`);
  }
  return value;
}

function readPoints(value: unknown, where: string): Point[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`${where} must be an array of points`);
  }
  return value.map((raw: unknown, i) => {
    if (!isRecord(raw)) {
      throw new TypeError(`${where}[${i}] must be a point`);
    }
    return { x: readNumber(raw, 'x', `${where}[${i}]`), y: readNumber(raw, 'y', `${where}[${i}]`) };
  });
}

function readWeights(value: unknown): MapWeights {
  if (!isRecord(value)) {
    throw new TypeError('snapshot.weights must be an object');
  }
  const weights = {
    grid: readNumber(value, 'grid', 'snapshot.weights'),
    circle: readNumber(value, 'circle', 'snapshot.weights'),
    horizontal: readNumber(value, 'horizontal', 'snapshot.weights'),
    vertical: readNumber(value, 'vertical', 'snapshot.weights'),
  };
  for (const [key, weight] of Object.entries(weights)) {
    if (weight < 0) {
      throw new TypeError(`snapshot.weights.${key} must not be negative`);
    }
  }
  return weights;
}

function readEncoding(value: unknown): Required<EncodingConfig> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new TypeError('snapshot.encoding must be an object');
  }
  return {
    minWidth: readPositive(value, 'minWidth', 'snapshot.encoding'),
    minHeight: readPositive(value, 'minHeight', 'snapshot.encoding'),
    minRadius: readPositive(value, 'minRadius', 'snapshot.encoding'),
  };
}

function readPrecision(record: Record<string, unknown>): number {
  const value = readNumber(record, 'precision', 'snapshot');
  if (!Number.isInteger(value) || value < 1) {
    throw new TypeError(`snapshot.precision must be a positive integer, got ${value}`);
  }
  return value;
}

/** Validate untrusted data (e.g. parsed JSON) as a library snapshot. */
export function parseSnapshot(data: unknown): LibrarySnapshot {
  if (!isRecord(data)) {
    throw new TypeError('snapshot must be an object');
  }
  if (data.version !== SNAPSHOT_VERSION) {
    throw new TypeError(`unsupported snapshot version: ${String(data.version)}`);
  }
  if (!Array.isArray(data.entries)) {
    throw new TypeError('snapshot.entries must be an array');
  }

  const entries: EntrySnapshot[] = data.entries.map((raw: unknown, i) => {
    if (!isRecord(raw)) {
      throw new TypeError(`snapshot.entries[${i}] must be an object`);
    }
    return {
      name: readString(raw, 'name', `snapshot.entries[${i}]`),
      points: readPoints(raw.points, `snapshot.entries[${i}].points`),
    };
  });

  return {
    version: SNAPSHOT_VERSION,
    name: readString(data, 'name', 'snapshot'),
    precision: readPrecision(data),
    weights: readWeights(data.weights),
    encoding: readEncoding(data.encoding),
    entries,
  };
}

/**
 * Rebuild a library from a snapshot, re-encoding each entry from its points
 * at the snapshot's precision. Precision, weights and entries come from the
 * snapshot; `options` supplies the debug flag and may override the stored
 * encoding minimums. The reserved entry is only present if the snapshot
 * lists it.
 */
export function fromSnapshot(snapshot: unknown, options?: LibraryOptions): MatchLibrary {
  const parsed = parseSnapshot(snapshot);
  const { grid, circle, horizontal, vertical } = parsed.weights;

  const library = new MatchLibrary(parsed.name, {
    debug: options?.debug ?? DEFAULT_LIBRARY_OPTIONS.debug,
    minWidth: options?.minWidth ?? parsed.encoding?.minWidth,
    minHeight: options?.minHeight ?? parsed.encoding?.minHeight,
    minRadius: options?.minRadius ?? parsed.encoding?.minRadius,
    precision: parsed.precision,
    gridWeight: grid,
    circleWeight: circle,
    horizontalWeight: horizontal,
    verticalWeight: vertical,
  });

  if (!parsed.entries.some(entry => entry.name === EMPTY_ENTRY_NAME)) {
    library.remove(EMPTY_ENTRY_NAME);
  }
  for (const entry of parsed.entries) {
    library.learn(entry.name, entry.points);
  }

  return library;
}
