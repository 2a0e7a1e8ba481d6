import { DocumentSyntaxError } from '../errors';
import { isArray, isPlainObject, isRecord } from '../guards';
import { type SourceLocation, formatPath } from './location';
import {
  type DocumentNode,
  MapNode,
  ScalarNode,
  SequenceNode
} from './nodes';

/**
 * Builds a document tree from in-memory JSON-like data.
 *
 * Mapping:
 * - plain object        -> map (own enumerable keys, insertion order)
 * - array               -> sequence
 * - string              -> scalar (verbatim)
 * - number / bigint     -> scalar (`String(value)`)
 * - boolean             -> scalar (`"true"` / `"false"`)
 * - `null` / `undefined`-> scalar `"null"`
 *
 * Every node is located by its logical path, e.g. `defaults#enemies[1].hp`.
 *
 * Example:
 *   fromValue({ x: 3, tags: ["a"] }, "defaults")
 *   -> map { x: scalar "3", tags: sequence [scalar "a"] }
 *
 * @param value
 *   Data to convert (typically the output of `JSON.parse`).
 * @param source
 *   Label used as the location source.
 * @throws DocumentSyntaxError
 *   For values with no document representation (functions, symbols, class
 *   instances, Maps, Dates, ...).
 */
export function fromValue(value: unknown, source = '<value>'): DocumentNode {
  return convertValue(value, source, '');
}

function convertValue(
  value: unknown,
  source: string,
  path: string
): DocumentNode {
  const location: SourceLocation = path ? { source, path } : { source };

  if (value === null || value === undefined) {
    return new ScalarNode('null', location);
  }

  switch (typeof value) {
    case 'string':
      return new ScalarNode(value, location);
    case 'number':
    case 'bigint':
    case 'boolean':
      return new ScalarNode(String(value), location);
  }

  if (isArray(value)) {
    return new SequenceNode(
      value.map((item, index) =>
        convertValue(item, source, formatPath(path, index))
      ),
      location
    );
  }

  if (isPlainObject(value)) {
    return new MapNode(
      Object.entries(value).map(
        ([key, item]) =>
          [key, convertValue(item, source, formatPath(path, key))] as const
      ),
      location
    );
  }

  throw new DocumentSyntaxError(
    `Cannot represent a value of type ${describeValueType(value)} as a document node`,
    location
  );
}

function describeValueType(value: unknown): string {
  if (typeof value !== 'object' || value === null) return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (isRecord(proto) && typeof proto.constructor === 'function') {
    return proto.constructor.name;
  }
  return 'object';
}

/**
 * Plain data view of a document tree: map -> object, sequence -> array,
 * scalar -> its text.
 *
 * Used by schema-backed decoders, which validate ordinary data rather than
 * document nodes.
 */
export function toPlainValue(node: DocumentNode): unknown {
  switch (node.kind) {
    case 'scalar':
      return node.text;
    case 'sequence':
      return node.items.map(toPlainValue);
    case 'map':
      // `fromEntries` defines properties, so a `__proto__` key stays data.
      return Object.fromEntries(
        node.pairs.map(([key, child]) => [key, toPlainValue(child)])
      );
  }
}
