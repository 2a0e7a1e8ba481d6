import { afterEach, describe, expect, test } from 'vitest';
import type { DocumentNode } from '../../document/nodes';
import { reify } from '../../entry';
import { ConversionError } from '../../errors';
import { NdArray } from '../../multi-array';
import { registerDecoder, unregisterDecoder } from '../../registry';
import { configure, resetSettings } from '../../settings';
import * as t from '../../types/builders';
import { Enemy, captureLogs, doc } from './fixtures';

/**
 * Test suite: fixed arrays, multi-dimensional arrays and sequences.
 *
 * Coverage:
 * - Reallocation rules and carried-over element identity.
 * - Partial copy when a multi-dimensional shape changes.
 * - Rejection of jagged input.
 * - In-place truncation and growth of sequences.
 */

const enemy = (name: string, hp: number): Enemy => ({ name, hp });

describe('Fixed arrays', () => {
  const Enemies = t.array(Enemy);

  test('Same length updates the existing array in place', () => {
    const existing = [enemy('a', 1), enemy('b', 2)];
    const result = reify(Enemies, existing, doc([{ hp: 5 }, { hp: 6 }]));

    expect(result).toBe(existing);
    expect(result).toEqual([enemy('a', 5), enemy('b', 6)]);
  });

  test('A shorter node truncates into a new array, keeping surviving elements', () => {
    const first = enemy('a', 1);
    const existing = [first, enemy('b', 2), enemy('c', 3)];
    const result = reify(Enemies, existing, doc([{ hp: 9 }]));

    expect(result).not.toBe(existing);
    expect(result).toHaveLength(1);
    expect(result[0]).toBe(first);
    expect(first).toEqual(enemy('a', 9));
  });

  test('A longer node appends freshly constructed elements', () => {
    const first = enemy('a', 1);
    const result = reify(Enemies, [first], doc([{ hp: 2 }, { name: 'new', hp: 3 }]));

    expect(result[0]).toBe(first);
    expect(result[1]).toEqual(enemy('new', 3));
  });

  test('An empty node yields a new empty array', () => {
    const existing = [enemy('a', 1)];
    const result = reify(Enemies, existing, doc([]));

    expect(result).toEqual([]);
    expect(result).not.toBe(existing);
  });

  test('Maps are rejected', () => {
    expect(() => reify(t.array(t.int32()), null, doc({ a: 1 }))).toThrow(
      'int32[]: Expected a sequence for int32[], got map with 1 key (at test)'
    );
  });
});

describe('Multi-dimensional arrays', () => {
  const Cell = t.custom<number>('Cell');
  const Grid = t.multiArray(Cell, 2);

  const grid = (rows: number[][]): NdArray<number> => {
    const array = new NdArray<number>([rows.length, rows[0].length]);
    for (const [i, row] of rows.entries()) {
      for (const [j, value] of row.entries()) array.set([i, j], value);
    }
    return array;
  };

  afterEach(() => {
    unregisterDecoder(Cell);
  });

  test('A shape change reallocates and feeds carried-over values to the element decode', () => {
    const seen: (number | null)[] = [];
    registerDecoder(Cell, (existing: number | null, node: DocumentNode) => {
      seen.push(existing);
      return node.kind === 'scalar' ? Number(node.text) : -1;
    });

    const existing = grid([
      [1, 2],
      [3, 4]
    ]);
    const input = doc([
      [0, 1, 2],
      [3, 4, 5],
      [6, 7, 8]
    ]);
    const result = reify(Grid, existing, input);

    expect(result).not.toBe(existing);
    expect(result.lengths).toEqual([3, 3]);
    expect(seen).toEqual([1, 2, null, 3, 4, null, null, null, null]);
    expect(result.toNested()).toEqual([
      [0, 1, 2],
      [3, 4, 5],
      [6, 7, 8]
    ]);
    expect(existing.toNested()).toEqual([
      [1, 2],
      [3, 4]
    ]);
  });

  test('A matching shape is updated in place', () => {
    const IntGrid = t.multiArray(t.int32(), 2);
    const existing = new NdArray<number>([2, 2]);

    const result = reify(IntGrid, existing, doc([[1, 2], [3, 4]]));

    expect(result).toBe(existing);
    expect(result.get([1, 0])).toBe(3);
  });

  test('Jagged input is rejected', () => {
    const IntGrid = t.multiArray(t.int32(), 2);
    let caught: unknown;
    try {
      reify(IntGrid, null, doc([[1, 2], [3]], 'grid'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConversionError);
    if (!(caught instanceof ConversionError)) return;
    expect(caught.path).toBe('int32[,][1]');
    expect(caught.message).toBe(
      'int32[,][1]: Jagged int32[,]: expected 2 items in dimension 1, got 1 (at grid#[1])'
    );
  });

  test('An empty node yields an empty array of the same rank', () => {
    const result = reify(t.multiArray(t.int32(), 3), null, doc([]));

    expect(result.rank).toBe(3);
    expect(result.size).toBe(0);
  });

  test('A zero-length inner dimension is accepted', () => {
    const result = reify(t.multiArray(t.int32(), 2), null, doc([[]]));

    expect(result.lengths).toEqual([1, 0]);
  });
});

describe('Sequences', () => {
  afterEach(() => {
    resetSettings();
  });

  test('Tail elements are dropped and retained slots overwritten in place', () => {
    const existing = [1, 2, 3, 4];
    const result = reify(t.sequence(t.int32()), existing, doc([9, 9]));

    expect(result).toBe(existing);
    expect(result).toEqual([9, 9]);
  });

  test('Missing slots are appended to the same array', () => {
    const existing = [1];
    const result = reify(t.sequence(t.int32()), existing, doc([5, 6, 7]));

    expect(result).toBe(existing);
    expect(result).toEqual([5, 6, 7]);
  });

  test('Record elements keep their identity', () => {
    const a = enemy('a', 1);
    const b = enemy('b', 2);
    const result = reify(t.sequence(Enemy), [a, b], doc([{ hp: 10 }, { hp: 20 }, { hp: 30 }]));

    expect(result[0]).toBe(a);
    expect(result[1]).toBe(b);
    expect(result.map((e) => e.hp)).toEqual([10, 20, 30]);
  });

  test('Truncation is logged at debug level', () => {
    const { logger, lines } = captureLogs();
    configure({ logger });

    reify(t.sequence(t.int32()), [1, 2, 3, 4], doc([9, 9]));

    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 20,
        msg: 'Truncating sequence',
        path: 'Sequence<int32>',
        from: 4,
        to: 2
      })
    );
  });
});
