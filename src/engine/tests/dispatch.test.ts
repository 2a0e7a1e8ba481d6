import { afterEach, describe, expect, test, vi } from 'vitest';
import type { DocumentNode } from '../../document/nodes';
import { reify } from '../../entry';
import {
  ContractViolationError,
  ConversionError,
  UnsupportedTypeError
} from '../../errors';
import { registerDecoder, unregisterDecoder } from '../../registry';
import { configure, resetSettings } from '../../settings';
import * as t from '../../types/builders';
import { Point, Tree, doc, scalar } from './fixtures';

/**
 * Test suite: shape dispatch and the error boundary.
 *
 * Coverage:
 * - Scalars, enums and optionals.
 * - Custom descriptors with and without a registered decoder.
 * - Wrapping of foreign errors with location and member path.
 * - The nesting depth bound.
 */

const Difficulty = t.enumOf('Difficulty', { Easy: 'easy', Hard: 'hard' });

// Shape of a compiled numeric enum, reverse mappings included.
const Speed = t.enumOf('Speed', { Slow: 0, Fast: 1, '0': 'Slow', '1': 'Fast' });

describe('Scalars and enums', () => {
  const scenarios = [
    {
      id: 'Scalar',
      description: 'int32 text decodes to a number',
      run: () => reify(t.int32(), null, scalar('42')),
      expected: 42
    },
    {
      id: 'Enum Name',
      description: 'Enum names match case-insensitively',
      run: () => reify(Difficulty, null, scalar('HARD')),
      expected: 'hard'
    },
    {
      id: 'Enum Value',
      description: 'Numeric enums also accept their integer value',
      run: () => reify(Speed, null, scalar('1')),
      expected: 1
    },
    {
      id: 'Enum Reverse Mapping',
      description: 'Reverse-mapping keys are not members',
      run: () => reify(Speed, null, scalar('fast')),
      expected: 1
    }
  ];

  test.for(scenarios)('[$id] $description', ({ run, expected }) => {
    expect(run()).toBe(expected);
  });

  test('Unknown enum names fail with a ConversionError', () => {
    expect(() => reify(Difficulty, null, scalar('medium'))).toThrow(
      'Difficulty: "medium" is not a member of enum Difficulty (at test)'
    );
  });

  test('Containers are rejected for scalar targets', () => {
    expect(() => reify(t.int32(), null, doc({ a: 1 }))).toThrow(
      'int32: Expected a scalar for int32, got map with 1 key (at test)'
    );
  });

  test('Unparsable text is wrapped with the node location', () => {
    expect(() => reify(t.uint8(), null, scalar('300', 'limits.cfg'))).toThrow(
      'uint8: Cannot decode uint8 from scalar "300": Invalid uint8 value "300" (out of range 0..255) (at limits.cfg)'
    );
  });
});

describe('Optional', () => {
  test('"null" short-circuits before the inner type', () => {
    expect(reify(t.optional(t.int32()), null, scalar('null'))).toBeNull();
    // A record would reject a scalar; the optional never asks it.
    expect(reify(t.optional(Point), null, scalar('null'))).toBeNull();
  });

  test('Other input decodes through the inner type', () => {
    expect(reify(t.optional(t.int32()), 1, scalar('5'))).toBe(5);
  });

  test('Without the wrapper "null" is just text', () => {
    expect(() => reify(t.int32(), null, scalar('null'))).toThrow(ConversionError);
    expect(reify(t.string(), null, scalar('null'))).toBe('null');
  });
});

describe('Custom descriptors', () => {
  interface Rgb {
    r: number;
    g: number;
    b: number;
  }
  const Color = t.custom<Rgb>('Color');

  const parseHex = (_existing: Rgb | null, node: DocumentNode): Rgb => {
    if (node.kind !== 'scalar' || !/^#[0-9a-f]{6}$/i.test(node.text)) {
      throw new Error('bad color');
    }
    const value = Number.parseInt(node.text.slice(1), 16);
    return { r: (value >> 16) & 0xff, g: (value >> 8) & 0xff, b: value & 0xff };
  };

  afterEach(() => {
    unregisterDecoder(Color);
  });

  test('Without a decoder the type is unsupported', () => {
    expect(() => reify(Color, null, scalar('#ffffff'))).toThrow(
      UnsupportedTypeError
    );
    expect(() => reify(Color, null, scalar('#ffffff'))).toThrow(
      "Color: Don't know how to update value of type Color (at test)"
    );
  });

  test('A registered decoder receives the existing value and the node', () => {
    const decoder = vi.fn(parseHex);
    registerDecoder(Color, decoder);

    const existing = { r: 1, g: 2, b: 3 };
    const node = scalar('#102030');

    expect(reify(Color, existing, node)).toEqual({ r: 16, g: 32, b: 48 });
    expect(decoder).toHaveBeenCalledWith(existing, node);
  });

  test('Decoder failures are wrapped at the innermost member', () => {
    registerDecoder(Color, parseHex);
    const Theme = t.record<{ primary: Rgb | null }>({
      name: 'Theme',
      create: () => ({ primary: null }),
      members: { primary: Color }
    });

    let caught: unknown;
    try {
      reify(Theme, null, doc({ primary: 'zzz' }, 'theme'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConversionError);
    if (!(caught instanceof ConversionError)) return;
    expect(caught.path).toBe('Theme.primary');
    expect(caught.location).toEqual({ source: 'theme', path: 'primary' });
    expect(caught.message).toBe(
      'Theme.primary: Cannot decode Color from scalar "zzz": bad color (at theme#primary)'
    );
    expect(caught.cause).toEqual(new Error('bad color'));
  });

  test('Callback types are never decodable on their own', () => {
    expect(() => reify(t.callback(), null, scalar('x'))).toThrow(
      UnsupportedTypeError
    );
  });
});

describe('Depth bound', () => {
  afterEach(() => {
    resetSettings();
  });

  test('Nesting deeper than maxDepth fails instead of recursing', () => {
    configure({ maxDepth: 2 });
    const input = doc({ children: [{ children: [] }] });

    expect(() => reify(Tree, null, input)).toThrow(
      'Tree.children[0].children: Document nesting exceeds the maximum depth of 2 (at test#children[0].children)'
    );
  });

  test('Nesting within the bound decodes', () => {
    configure({ maxDepth: 3 });
    const input = doc({
      label: 'root',
      children: [{ label: 'leaf', children: [] }]
    });
    const tree = reify(Tree, null, input);

    expect(tree.children[0].label).toBe('leaf');
  });

  test('Contract violations pass the boundary unwrapped', () => {
    expect(() => reify(Point, null, scalar('3'))).toThrow(ContractViolationError);
  });
});
