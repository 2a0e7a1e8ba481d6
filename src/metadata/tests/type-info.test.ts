import { describe, expect, test } from 'vitest';
import { ContractViolationError } from '../../errors';
import * as t from '../../types/builders';
import { exposedNameOf, getTypeInfo } from '../type-info';

describe('Type metadata', () => {
  const scenarios = [
    { id: 'Plain', name: 'speed', expected: 'speed' },
    { id: 'Member Prefix', name: 'm_speed', expected: 'speed' },
    { id: 'Underscore', name: '_speed', expected: 'speed' },
    { id: 'Only Prefix', name: '_', expected: '_' },
    { id: 'Inner Underscore', name: 'max_speed', expected: 'max_speed' }
  ];

  test.for(scenarios)('[$id] $name is exposed as $expected', ({ name, expected }) => {
    expect(exposedNameOf(name)).toBe(expected);
  });

  test('Info is built once per descriptor and thunks resolve once', () => {
    let resolutions = 0;
    const Linked = t.record<{ next: object | null }>({
      name: 'Linked',
      create: () => ({ next: null }),
      members: {
        next: () => {
          resolutions += 1;
          return t.optional(t.int32());
        }
      }
    });

    const first = getTypeInfo(Linked);
    const second = getTypeInfo(Linked);

    expect(second).toBe(first);
    expect(resolutions).toBe(1);
    expect(first.members[0].type.kind).toBe('optional');
  });

  test('Base members come first, then own members in declaration order', () => {
    const Base = t.record<{ id: string }>({
      name: 'Base',
      create: () => ({ id: '' }),
      members: { id: t.string() }
    });
    const Derived = t.record<{ id: string; m_b: number; a: number }>({
      name: 'Derived',
      base: Base,
      create: () => ({ id: '', m_b: 0, a: 0 }),
      members: { m_b: t.int32(), a: t.field(t.int32(), { key: 'alpha' }) }
    });

    const info = getTypeInfo(Derived);

    expect(info.members.map((m) => [m.name, m.exposedName])).toEqual([
      ['id', 'id'],
      ['m_b', 'b'],
      ['a', 'alpha']
    ]);
    expect(info.semantics).toBe('reference');
    expect(info.frameworkBase).toBe(false);
  });

  test('Duplicate exposed names are a contract violation', () => {
    const Clash = t.record<{ speed: number; m_speed: number }>({
      name: 'Clash',
      create: () => ({ speed: 0, m_speed: 0 }),
      members: { speed: t.float64(), m_speed: t.float64() }
    });

    expect(() => getTypeInfo(Clash)).toThrow(ContractViolationError);
    expect(() => getTypeInfo(Clash)).toThrow(
      'Record Clash exposes "speed" twice (members speed and m_speed)'
    );
  });

  test('The default copy is a shallow copy onto a fresh instance', () => {
    const Pair = t.record<{ a: number[]; b: number }>({
      name: 'Pair',
      create: () => ({ a: [], b: 0 }),
      semantics: 'value',
      members: { a: t.sequence(t.int32()), b: t.int32() }
    });
    const source = { a: [1], b: 2 };

    const copy = getTypeInfo(Pair).copy(source);

    expect(copy).not.toBe(source);
    expect(copy).toEqual(source);
  });
});
