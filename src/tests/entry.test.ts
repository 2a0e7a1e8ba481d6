import { describe, expect, test } from 'vitest';
import { fromValue } from '../document/from-value';
import { parseDocument } from '../document/parser';
import { reify, safeReify, setFieldsOnObject } from '../entry';
import {
  ContractViolationError,
  ConversionError,
  MissingFieldsError
} from '../errors';
import { ReificationOptions } from '../options';
import * as t from '../types/builders';

/**
 * Test suite: public entry points, end to end from text.
 */

interface Enemy {
  name: string;
  hp: number;
  speed: number;
}

interface Level {
  title: string;
  enemies: Enemy[];
  spawn: Map<string, number>;
}

const Enemy = t.record<Enemy>({
  name: 'Enemy',
  create: () => ({ name: '', hp: 10, speed: 1 }),
  members: { name: t.string(), hp: t.uint16(), speed: t.float32() }
});

const Level = t.record<Level>({
  name: 'Level',
  create: () => ({ title: '', enemies: [], spawn: new Map() }),
  members: {
    title: t.string(),
    enemies: t.sequence(Enemy),
    spawn: t.map(t.string(), t.int32())
  }
});

const LEVEL_TEXT = `{
  title: "Caves",
  enemies: [
    { name: "bat", hp: 3, speed: 2.5 },
    { name: "slime" }
  ],
  spawn: { north: 2, south: -1 },
}`;

describe('Entry points', () => {
  test('reify decodes a parsed document into a fresh value', () => {
    const level = reify(Level, null, parseDocument(LEVEL_TEXT, { source: 'caves.cfg' }));

    expect(level).toEqual({
      title: 'Caves',
      enemies: [
        { name: 'bat', hp: 3, speed: 2.5 },
        { name: 'slime', hp: 10, speed: 1 }
      ],
      spawn: new Map([
        ['north', 2],
        ['south', -1]
      ])
    });
  });

  test('Errors point at the source text position', () => {
    const text = '{\n  enemies: [{ hp: -3 }]\n}';

    expect(() => reify(Level, null, parseDocument(text, { source: 'bad.cfg' }))).toThrow(
      'Level.enemies[0].hp: Cannot decode uint16 from scalar "-3": Invalid uint16 value "-3" (out of range 0..65535) (at bad.cfg:2:19)'
    );
  });

  test('setFieldsOnObject populates the given instance without hooks', () => {
    let hooks = 0;
    const Tracked = t.record<{ n: number }>({
      name: 'Tracked',
      create: () => ({ n: 0 }),
      members: { n: t.int32() },
      postDoc: (value) => {
        hooks += 1;
        return value;
      }
    });
    const instance = { n: 1 };

    const result = setFieldsOnObject(Tracked, instance, fromValue({ n: 2 }));

    expect(result).toBe(instance);
    expect(instance.n).toBe(2);
    expect(hooks).toBe(0);
  });

  test('setFieldsOnObject requires an instance', () => {
    expect(() => setFieldsOnObject(Level, null, fromValue({}, 'x'))).toThrow(
      new ContractViolationError("Can't set fields of Level on null", { source: 'x' })
    );
  });

  test('setFieldsOnObject applies the given options', () => {
    const instance = { title: '', enemies: [], spawn: new Map<string, number>() };

    expect(() =>
      setFieldsOnObject(
        Level,
        instance,
        fromValue({ title: 'x' }),
        ReificationOptions.AllowExtraFields | ReificationOptions.CaseSensitive
      )
    ).toThrow(MissingFieldsError);
    expect(instance.title).toBe('x');
  });

  test('safeReify returns a result object', () => {
    expect(safeReify(t.int32(), null, fromValue('7'))).toEqual({
      success: true,
      value: 7
    });

    const failure = safeReify(t.int32(), null, fromValue('x'));
    expect(failure.success).toBe(false);
    if (failure.success) return;
    expect(failure.error).toBeInstanceOf(ConversionError);
  });
});
