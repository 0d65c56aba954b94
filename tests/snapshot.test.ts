import { describe, it, expect } from 'vitest';
import { MatchLibrary, EMPTY_ENTRY_NAME, toSnapshot, fromSnapshot, parseSnapshot, encode } from '../src/index.js';
import { makeCircle, makeLine, makeStroke, makeV } from './fixtures/helpers.js';

function sampleLibrary(): MatchLibrary {
  const library = new MatchLibrary('sample', { precision: 6 });
  library.setWeights(1, 2, 0.5, 0.25);
  library.learn('tri', makeStroke([[0, 0], [40, 60], [80, 0], [0, 0]]));
  library.learn('vee', makeV(0, 0, 120));
  return library;
}

describe('toSnapshot', () => {
  it('stores name, precision, weights and entry points', () => {
    const snapshot = toSnapshot(sampleLibrary());

    expect(snapshot.version).toBe(1);
    expect(snapshot.name).toBe('sample');
    expect(snapshot.precision).toBe(6);
    expect(snapshot.weights).toEqual({ grid: 1, circle: 2, horizontal: 0.5, vertical: 0.25 });
    expect(snapshot.encoding).toEqual({ minWidth: 50, minHeight: 50, minRadius: 25 });
    expect(snapshot.entries.map(e => e.name)).toEqual(['Empty', 'tri', 'vee']);
    expect(snapshot.entries[0].points).toEqual([]);
    expect(snapshot.entries[1].points).toEqual([
      { x: 0, y: 0 }, { x: 40, y: 60 }, { x: 80, y: 0 }, { x: 0, y: 0 },
    ]);
  });
});

describe('fromSnapshot', () => {
  it('rebuilds an equivalent library through JSON', () => {
    const original = sampleLibrary();
    const restored = fromSnapshot(JSON.parse(JSON.stringify(toSnapshot(original))));

    expect(restored.name).toBe('sample');
    expect(restored.precision).toBe(6);
    expect(restored.weights).toEqual(original.weights);
    expect(restored.names()).toEqual(original.names());

    for (const entry of original.entries()) {
      const copy = restored.get(entry.name);
      expect(copy?.shape.gridMap()).toEqual(entry.shape.gridMap());
      expect(copy?.shape.circleMap()).toEqual(entry.shape.circleMap());
      expect(copy?.shape.flatMap('horizontal')).toEqual(entry.shape.flatMap('horizontal'));
      expect(copy?.shape.flatMap('vertical')).toEqual(entry.shape.flatMap('vertical'));
    }

    const probe = encode(makeCircle(20, 20, 40), 6);
    expect(restored.rank(probe)).toEqual(original.rank(probe));
  });

  it('leaves out the reserved entry when the snapshot has none', () => {
    const library = new MatchLibrary('bare');
    library.remove(EMPTY_ENTRY_NAME);
    library.learn('line', makeLine(0, 0, 200, 0));
    library.learn('ring', makeCircle(0, 0, 80));

    const restored = fromSnapshot(JSON.parse(JSON.stringify(toSnapshot(library))));
    const stroke = encode(makeCircle(0, 0, 80), 5);

    expect(restored.names()).toEqual(['line', 'ring']);
    expect(restored.rank(stroke)).toEqual(library.rank(stroke));
  });

  it('restores the stored encoding minimums', () => {
    const library = new MatchLibrary('tight', { minWidth: 20, minHeight: 30, minRadius: 5 });
    library.learn('dot', makeStroke([[10, 10], [12, 11]]));

    const restored = fromSnapshot(JSON.parse(JSON.stringify(toSnapshot(library))));

    expect(restored.options.minWidth).toBe(20);
    expect(restored.options.minHeight).toBe(30);
    expect(restored.options.minRadius).toBe(5);
    expect(restored.get('dot')?.shape.circleMap('mass')[1]).toEqual([0.5, 0, 0.5, 0]);
  });

  it('falls back to default minimums when the snapshot stores none', () => {
    const { encoding: _encoding, ...legacy } = toSnapshot(new MatchLibrary('tight', { minRadius: 5 }));
    expect(fromSnapshot(legacy).options.minRadius).toBe(25);
  });

  it('applies encoding options from the caller', () => {
    const restored = fromSnapshot(toSnapshot(sampleLibrary()), { minRadius: 10, debug: true });
    expect(restored.options.minRadius).toBe(10);
    expect(restored.options.debug).toBe(true);
    expect(restored.get('vee')?.shape.encoding.minRadius).toBe(10);
  });

  it('rejects malformed snapshots', () => {
    const valid = toSnapshot(sampleLibrary());

    expect(() => fromSnapshot(null)).toThrow(TypeError);
    expect(() => fromSnapshot({ ...valid, version: 2 })).toThrow('unsupported snapshot version: 2');
    expect(() => fromSnapshot({ ...valid, entries: 'none' })).toThrow('snapshot.entries must be an array');
    expect(() => fromSnapshot({ ...valid, weights: { grid: 1 } })).toThrow('snapshot.weights.circle must be a finite number');
    expect(() => parseSnapshot({ ...valid, entries: [{ name: 'x', points: [{ x: 1, y: 'up' }] }] }))
      .toThrow('snapshot.entries[0].points[0].y must be a finite number');
  });

  it('rejects an out-of-range precision or weight as malformed', () => {
    const valid = toSnapshot(sampleLibrary());

    expect(() => fromSnapshot({ ...valid, precision: 0 })).toThrow(TypeError);
    expect(() => fromSnapshot({ ...valid, precision: 2.5 }))
      .toThrow('snapshot.precision must be a positive integer, got 2.5');
    expect(() => fromSnapshot({ ...valid, weights: { ...valid.weights, circle: -1 } }))
      .toThrow('snapshot.weights.circle must not be negative');
    expect(() => fromSnapshot({ ...valid, encoding: { minWidth: 50, minHeight: 0, minRadius: 25 } }))
      .toThrow('snapshot.encoding.minHeight must be positive');
  });
});
