import { ContractViolationError } from '../errors';
import type { ScalarKind } from '../scalars';
import type {
  ArrayDescriptor,
  CallbackDescriptor,
  CustomDescriptor,
  EnumDescriptor,
  MapDescriptor,
  MemberAccess,
  MemberFlags,
  MemberSpec,
  MultiArrayDescriptor,
  OptionalDescriptor,
  RecordDefinition,
  RecordDescriptor,
  ScalarDescriptor,
  SequenceDescriptor,
  TypeDescriptor
} from './descriptors';

/**
 * Descriptor builders.
 *
 * Exposed as the `t` namespace:
 *
 * ```ts
 * import { t } from 'doc-reifier';
 *
 * const Point = t.record<Point>({
 *   name: 'Point',
 *   create: () => ({ x: 0, y: 0 }),
 *   members: { x: t.int32(), y: t.int32() }
 * });
 * ```
 *
 * Scalar builders return one shared descriptor per kind.
 */

function scalar<K extends ScalarKind>(kind: K): ScalarDescriptor<K> {
  return { kind: 'scalar', scalar: kind };
}

const BOOL = scalar('bool');
const INT8 = scalar('int8');
const UINT8 = scalar('uint8');
const INT16 = scalar('int16');
const UINT16 = scalar('uint16');
const INT32 = scalar('int32');
const UINT32 = scalar('uint32');
const INT64 = scalar('int64');
const UINT64 = scalar('uint64');
const FLOAT32 = scalar('float32');
const FLOAT64 = scalar('float64');
const CHAR = scalar('char');
const STRING = scalar('string');

export const bool = (): ScalarDescriptor<'bool'> => BOOL;
export const int8 = (): ScalarDescriptor<'int8'> => INT8;
export const uint8 = (): ScalarDescriptor<'uint8'> => UINT8;
export const int16 = (): ScalarDescriptor<'int16'> => INT16;
export const uint16 = (): ScalarDescriptor<'uint16'> => UINT16;
export const int32 = (): ScalarDescriptor<'int32'> => INT32;
export const uint32 = (): ScalarDescriptor<'uint32'> => UINT32;
export const int64 = (): ScalarDescriptor<'int64'> => INT64;
export const uint64 = (): ScalarDescriptor<'uint64'> => UINT64;
export const float32 = (): ScalarDescriptor<'float32'> => FLOAT32;
export const float64 = (): ScalarDescriptor<'float64'> => FLOAT64;
export const char = (): ScalarDescriptor<'char'> => CHAR;
export const string = (): ScalarDescriptor<'string'> => STRING;

const CANONICAL_INDEX = /^(?:0|[1-9]\d*)$/;

/**
 * Builds an enum descriptor from a name → value object.
 *
 * Accepts `as const` objects and TypeScript enums alike; the reverse mapping
 * entries a numeric enum carries (`"0": "Red"`) are skipped.
 *
 * @throws ContractViolationError if two names differ only by case.
 */
export function enumOf<V extends string | number>(
  name: string,
  values: Readonly<Record<string, V>>
): EnumDescriptor<V> {
  const byName = new Map<string, V>();

  for (const [key, value] of Object.entries(values)) {
    if (CANONICAL_INDEX.test(key) && typeof value === 'string') continue;

    const folded = key.toUpperCase();
    if (byName.has(folded)) {
      throw new ContractViolationError(
        `Enum ${name} has members differing only by case: ${key}`
      );
    }
    byName.set(folded, value);
  }

  return { kind: 'enum', name, values: byName };
}

export function optional<T>(inner: TypeDescriptor<T>): OptionalDescriptor<T> {
  return { kind: 'optional', inner };
}

export function array<E>(element: TypeDescriptor<E>): ArrayDescriptor<E> {
  return { kind: 'array', element };
}

/**
 * @throws ContractViolationError if `rank` is not an integer >= 2
 *   (use {@link array} for rank 1).
 */
export function multiArray<E>(
  element: TypeDescriptor<E>,
  rank: number
): MultiArrayDescriptor<E> {
  if (!Number.isInteger(rank) || rank < 2) {
    throw new ContractViolationError(
      `multiArray rank must be an integer >= 2, got ${rank}`
    );
  }
  return { kind: 'multiArray', element, rank };
}

export function sequence<E>(element: TypeDescriptor<E>): SequenceDescriptor<E> {
  return { kind: 'sequence', element };
}

export function map<K, V>(
  key: TypeDescriptor<K>,
  value: TypeDescriptor<V>
): MapDescriptor<K, V> {
  return { kind: 'map', key, value };
}

/**
 * A type decoded only through a registered decoder.
 *
 * Identity matters: keep the returned descriptor and register against it.
 */
export function custom<T>(name: string): CustomDescriptor<T> {
  return { kind: 'custom', name };
}

export function callback<
  F extends (...args: never[]) => unknown = () => void
>(): CallbackDescriptor<F> {
  return { kind: 'callback' };
}

export function record<T extends object>(
  definition: RecordDefinition<T>
): RecordDescriptor<T> {
  return { ...definition, kind: 'record' };
}

/**
 * A plain property member with policy flags.
 */
export function field<T = object>(
  type: TypeDescriptor | (() => TypeDescriptor),
  flags: MemberFlags = {}
): MemberSpec<T> {
  return { ...flags, type };
}

/**
 * A member read and written through explicit functions rather than a
 * property. Omit `set` for a read-only member.
 */
export function accessor<T, V>(
  type: TypeDescriptor<V> | (() => TypeDescriptor<V>),
  access: {
    get(instance: T): V;
    set?(instance: T, value: V): void;
  },
  flags: MemberFlags = {}
): MemberSpec<T> {
  const memberAccess: MemberAccess<T> = access;
  return { ...flags, type, access: memberAccess };
}
