import type { Point, RecognizerConfig, RankedMatch, RecognitionRecord } from './types.js';
import type { ResolvedConfig } from './internal/types.js';
import type { LabeledEntry } from './match-library.js';
import { EncodedShape } from './encoded-shape.js';
import { MatchLibrary } from './match-library.js';
import { assertPrecision, assertWeight, resolveConfig } from './internal/config.js';
import { debugLog } from './internal/log.js';

export { DEFAULT_CONFIG } from './internal/config.js';

/**
 * Holds a set of named libraries, one of them selected, and matches
 * finished strokes against the selected one.
 */
export class Recognizer {
  private readonly settings: ResolvedConfig;
  private readonly libraryMap = new Map<string, MatchLibrary>();
  private current: MatchLibrary | undefined;
  private records: RecognitionRecord[] = [];

  constructor(config?: RecognizerConfig) {
    this.settings = resolveConfig(config);
  }

  get config(): Readonly<ResolvedConfig> {
    return this.settings;
  }

  /** The selected library, if any has been created. */
  get currentLibrary(): MatchLibrary | undefined {
    return this.current;
  }

  libraries(): MatchLibrary[] {
    return [...this.libraryMap.values()];
  }

  /**
   * Create a library with this recognizer's precision, weights and encoding,
   * or return the existing one with that name. The first library created
   * becomes the selected one.
   */
  createLibrary(name: string): MatchLibrary {
    const existing = this.libraryMap.get(name);
    if (existing) return existing;

    const library = new MatchLibrary(name, this.settings);
    this.libraryMap.set(name, library);
    if (!this.current) this.current = library;
    return library;
  }

  /**
   * Add an already built library (e.g. one loaded from a snapshot),
   * re-encoded to this recognizer's precision. Replaces a library of the
   * same name.
   */
  addLibrary(library: MatchLibrary): void {
    if (library.precision !== this.config.precision) {
      library.setPrecision(this.config.precision);
    }
    const replaced = this.libraryMap.get(library.name);
    this.libraryMap.set(library.name, library);
    if (!this.current || this.current === replaced) {
      this.current = library;
    }
  }

  /** Select a library by name. Returns false if there is none. */
  selectLibrary(name: string): boolean {
    const library = this.libraryMap.get(name);
    if (!library) return false;
    this.current = library;
    return true;
  }

  /** Drop a library. If it was selected, the first remaining one is selected. */
  removeLibrary(name: string): boolean {
    const library = this.libraryMap.get(name);
    if (!library) return false;

    this.libraryMap.delete(name);
    if (this.current === library) {
      this.current = this.libraries()[0];
    }
    return true;
  }

  /** Encode a stroke with this recognizer's precision and encoding. */
  encode(points: readonly Point[]): EncodedShape {
    return new EncodedShape(points, this.config.precision, this.config);
  }

  /**
   * Store a stroke under a name in the selected library, creating a
   * library called "Default" if none exists yet.
   */
  learn(name: string, points: readonly Point[]): LabeledEntry {
    const library = this.current ?? this.createLibrary('Default');
    return library.learn(name, points);
  }

  /**
   * Best match for a stroke in the selected library (or the named one).
   * Returns undefined when there is no such library or it has no entries.
   */
  recognize(points: readonly Point[], libraryName?: string): RankedMatch | undefined {
    const library = libraryName === undefined ? this.current : this.libraryMap.get(libraryName);
    if (!library) return undefined;

    const match = library.bestMatch(this.encode(points));
    this.remember({ library: library.name, match: match ?? null, pointCount: points.length });
    debugLog(this.config.debug, 'RECOGNIZED', { library: library.name, match });
    return match;
  }

  /** Every entry of the selected library ranked against a stroke. */
  rank(points: readonly Point[]): RankedMatch[] {
    return this.current ? this.current.rank(this.encode(points)) : [];
  }

  /** Most recent recognitions, oldest first. */
  history(): readonly RecognitionRecord[] {
    return [...this.records];
  }

  clearHistory(): void {
    this.records = [];
  }

  /** Change the precision and re-encode every stored entry of every library. */
  setPrecision(precision: number): void {
    assertPrecision(precision);
    this.settings.precision = precision;
    for (const library of this.libraryMap.values()) {
      library.setPrecision(precision);
    }
  }

  /** Change the map weights of every library, and of libraries created later. */
  setWeights(grid: number, circle: number, horizontal: number, vertical: number): void {
    assertWeight('grid weight', grid);
    assertWeight('circle weight', circle);
    assertWeight('horizontal weight', horizontal);
    assertWeight('vertical weight', vertical);
    this.settings.gridWeight = grid;
    this.settings.circleWeight = circle;
    this.settings.horizontalWeight = horizontal;
    this.settings.verticalWeight = vertical;
    for (const library of this.libraryMap.values()) {
      library.setWeights(grid, circle, horizontal, vertical);
    }
  }

  private remember(record: RecognitionRecord): void {
    if (this.config.historySize === 0) return;
    this.records.push(record);
    if (this.records.length > this.config.historySize) {
      this.records.splice(0, this.records.length - this.config.historySize);
    }
  }
}

/**
 * Rank a stroke against a library and return the best match. For repeated
 * use, prefer a Recognizer or MatchLibrary.bestMatch().
 */
export function recognize(points: readonly Point[], library: MatchLibrary): RankedMatch | undefined {
  return library.bestMatch(new EncodedShape(points, library.precision, library.options));
}
