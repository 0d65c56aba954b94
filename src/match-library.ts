import type { Point, LibraryOptions, MapWeights, RankedMatch } from './types.js';
import type { ResolvedLibraryOptions } from './internal/types.js';
import { EncodedShape } from './encoded-shape.js';
import { assertPrecision, assertWeight, resolveLibraryOptions } from './internal/config.js';
import { INCOMPARABLE_DIFFERENCE } from './internal/compare.js';
import { fuseScore, shapeDifferences, toPercentages } from './internal/scoring.js';
import { debugLog } from './internal/log.js';

/** Name of the reserved zero-point entry every library holds after construction and clear(). */
export const EMPTY_ENTRY_NAME = 'Empty';

/** A named reference shape stored in a library. */
export interface LabeledEntry {
  readonly name: string;
  readonly shape: EncodedShape;
}

/**
 * Named collection of reference shapes, ranked against incoming strokes.
 *
 * Entries are keyed by name and kept in insertion order; adding under an
 * existing name swaps the shape in place. The library stores its own copy
 * of every shape it is given, encoded at the library's precision, so
 * setPrecision() on one library never reaches another library or the caller.
 */
export class MatchLibrary {
  readonly name: string;
  readonly options: Readonly<ResolvedLibraryOptions>;

  private readonly entryMap = new Map<string, LabeledEntry>();
  private currentPrecision: number;
  private currentWeights: MapWeights;

  constructor(name: string, options?: LibraryOptions) {
    this.name = name;
    this.options = Object.freeze(resolveLibraryOptions(options));
    this.currentPrecision = this.options.precision;
    this.currentWeights = {
      grid: this.options.gridWeight,
      circle: this.options.circleWeight,
      horizontal: this.options.horizontalWeight,
      vertical: this.options.verticalWeight,
    };
    this.addEmpty();
  }

  /** Precision used for learned entries and the reserved entry. */
  get precision(): number {
    return this.currentPrecision;
  }

  get size(): number {
    return this.entryMap.size;
  }

  get weights(): Readonly<MapWeights> {
    return { ...this.currentWeights };
  }

  /** Entries in insertion order. */
  entries(): LabeledEntry[] {
    return [...this.entryMap.values()];
  }

  names(): string[] {
    return [...this.entryMap.keys()];
  }

  has(name: string): boolean {
    return this.entryMap.has(name);
  }

  get(name: string): LabeledEntry | undefined {
    return this.entryMap.get(name);
  }

  /**
   * Add a copy of a shape under a name, replacing (in place) any entry with
   * that name. Returns the stored entry.
   */
  add(name: string, shape: EncodedShape): LabeledEntry {
    return this.addEntry({ name, shape });
  }

  addEntry(entry: LabeledEntry): LabeledEntry {
    return this.store(entry.name, new EncodedShape(entry.shape.points, this.currentPrecision, entry.shape.encoding));
  }

  /** Encode a stroke with this library's precision and encoding, then add it. */
  learn(name: string, points: readonly Point[]): LabeledEntry {
    return this.store(name, new EncodedShape(points, this.currentPrecision, this.options));
  }

  /**
   * Remove an entry by name, or a specific entry object.
   * An entry object is only removed if it is the one currently stored under its name,
   * as returned by add() or get().
   * Returns false when nothing was removed.
   */
  remove(target: string | LabeledEntry): boolean {
    if (typeof target === 'string') {
      return this.entryMap.delete(target);
    }

    const stored = this.entryMap.get(target.name);
    if (stored === undefined || (stored !== target && stored.shape !== target.shape)) {
      return false;
    }
    return this.entryMap.delete(target.name);
  }

  /** Remove every entry, leaving only the reserved empty one. */
  clear(): void {
    this.entryMap.clear();
    this.addEmpty();
  }

  setWeights(grid: number, circle: number, horizontal: number, vertical: number): void {
    assertWeight('grid weight', grid);
    assertWeight('circle weight', circle);
    assertWeight('horizontal weight', horizontal);
    assertWeight('vertical weight', vertical);
    this.currentWeights = { grid, circle, horizontal, vertical };
  }

  /** Re-encode every stored shape at a new precision. */
  setPrecision(precision: number): void {
    assertPrecision(precision);
    this.currentPrecision = precision;
    for (const entry of this.entryMap.values()) {
      entry.shape.setPrecision(precision);
    }
  }

  /** Raw score of a shape against one entry. Lower is closer. */
  score(shape: EncodedShape, entry: LabeledEntry): number {
    return fuseScore(shapeDifferences(shape, entry.shape), this.currentWeights);
  }

  /**
   * Score of two stored entries against each other, or
   * INCOMPARABLE_DIFFERENCE when either name is unknown.
   */
  compare(nameA: string, nameB: string): number {
    const a = this.entryMap.get(nameA);
    const b = this.entryMap.get(nameB);
    if (!a || !b) return INCOMPARABLE_DIFFERENCE;
    return this.score(a.shape, b);
  }

  /**
   * Every entry ranked against a shape, closest first.
   * Ties keep insertion order.
   */
  rank(shape: EncodedShape): RankedMatch[] {
    const scored: { name: string; score: number }[] = [];

    for (const entry of this.entryMap.values()) {
      const diffs = shapeDifferences(shape, entry.shape);
      const score = fuseScore(diffs, this.currentWeights);
      debugLog(this.options.debug, 'MATCH_SCORES', { name: entry.name, ...diffs, score });
      scored.push({ name: entry.name, score });
    }

    scored.sort((a, b) => a.score - b.score);
    const percents = toPercentages(scored.map(s => s.score));

    const ranked = scored.map((s, i) => ({ name: s.name, score: s.score, percent: percents[i] }));
    debugLog(this.options.debug, 'MATCH_RANK', ranked.map(r => `${r.name}: ${r.percent}%`));
    return ranked;
  }

  /** Closest entry, or undefined when the library holds no entries. */
  bestMatch(shape: EncodedShape): RankedMatch | undefined {
    return this.rank(shape)[0];
  }

  private store(name: string, shape: EncodedShape): LabeledEntry {
    const stored = Object.freeze({ name, shape });
    this.entryMap.set(name, stored);
    return stored;
  }

  private addEmpty(): void {
    this.store(EMPTY_ENTRY_NAME, new EncodedShape([], this.currentPrecision, this.options));
  }
}
