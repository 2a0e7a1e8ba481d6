import { describe, expect, test } from 'vitest';
import { DocumentSyntaxError } from '../../errors';
import { fromValue, toPlainValue } from '../from-value';
import type { DocumentNode } from '../nodes';
import { captureError } from './helpers';

describe('fromValue', () => {
  const scenarios = [
    {
      id: 'Primitives',
      description: 'Numbers, booleans and bigints become scalar text',
      value: { n: 3, f: -0.5, b: false, big: 5n },
      expected: { n: '3', f: '-0.5', b: 'false', big: '5' }
    },
    {
      id: 'Empty',
      description: 'null and undefined both become the scalar "null"',
      value: [null, undefined],
      expected: ['null', 'null']
    },
    {
      id: 'Nested',
      description: 'Objects and arrays nest',
      value: { tags: ['a', 'b'], inner: { ok: true } },
      expected: { tags: ['a', 'b'], inner: { ok: 'true' } }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ value, expected }) => {
    expect(toPlainValue(fromValue(value))).toEqual(expected);
  });

  test('Nodes are located by logical path', () => {
    const doc = fromValue({ a: { b: [1, 2] } }, 'defaults');

    const at = (node: DocumentNode | undefined): DocumentNode => {
      if (!node) throw new Error('missing node');
      return node;
    };
    const a = at(doc.kind === 'map' ? doc.get('a') : undefined);
    const b = at(a.kind === 'map' ? a.get('b') : undefined);
    const second = at(b.kind === 'sequence' ? b.items[1] : undefined);

    expect(doc.location).toEqual({ source: 'defaults' });
    expect(second.location).toEqual({ source: 'defaults', path: 'a.b[1]' });
  });

  test('Class instances are rejected with their type name', () => {
    const error = captureError(() =>
      fromValue({ when: new Date(0) }, 'defaults')
    );
    expect(error).toBeInstanceOf(DocumentSyntaxError);
    expect(error.message).toBe(
      'Cannot represent a value of type Date as a document node (at defaults#when)'
    );
  });

  test('A "__proto__" key survives the round trip as data', () => {
    const plain = toPlainValue(fromValue(JSON.parse('{"__proto__": 1}')));
    if (typeof plain !== 'object' || plain === null) {
      throw new Error('expected an object');
    }
    expect(Object.keys(plain)).toEqual(['__proto__']);
  });
});
