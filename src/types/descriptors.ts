import type { DocumentNode } from '../document/nodes';
import type { NdArray } from '../multi-array';
import type { ScalarKind, ScalarValue } from '../scalars';

/**
 * Phantom carrier of the TypeScript type a descriptor decodes to.
 *
 * The property is never present at runtime. It only lets `reify(type, ...)`
 * infer its return type from the descriptor argument.
 */
export interface Decoded<T> {
  readonly __output?: T;
}

/**
 * Extracts the decoded type from a descriptor.
 *
 * ```ts
 * type P = Infer<typeof Point>; // Point
 * ```
 */
export type Infer<D> = D extends Decoded<infer T> ? T : never;

export interface ScalarDescriptor<K extends ScalarKind = ScalarKind>
  extends Decoded<ScalarValue<K>> {
  readonly kind: 'scalar';
  readonly scalar: K;
}

/**
 * Closed set of names mapped to values.
 *
 * `values` is keyed by the upper-cased member name; lookups are always
 * case-insensitive.
 */
export interface EnumDescriptor<V extends string | number = string | number>
  extends Decoded<V> {
  readonly kind: 'enum';
  readonly name: string;
  readonly values: ReadonlyMap<string, V>;
}

/**
 * Nullable wrapper: the scalar text `null` decodes to `null` without
 * consulting `inner`.
 */
export interface OptionalDescriptor<T = unknown> extends Decoded<T | null> {
  readonly kind: 'optional';
  readonly inner: TypeDescriptor<T>;
}

/**
 * Fixed-length array. Reallocated whenever the input length differs from the
 * existing array's length.
 */
export interface ArrayDescriptor<E = unknown> extends Decoded<E[]> {
  readonly kind: 'array';
  readonly element: TypeDescriptor<E>;
}

/**
 * Rectangular array of rank >= 2, backed by {@link NdArray}.
 */
export interface MultiArrayDescriptor<E = unknown> extends Decoded<NdArray<E>> {
  readonly kind: 'multiArray';
  readonly element: TypeDescriptor<E>;
  readonly rank: number;
}

/**
 * Resizable sequence. The existing array is truncated and extended in place.
 */
export interface SequenceDescriptor<E = unknown> extends Decoded<E[]> {
  readonly kind: 'sequence';
  readonly element: TypeDescriptor<E>;
}

/**
 * Associative map. Keys are decoded from the input key text through `key`.
 */
export interface MapDescriptor<K = unknown, V = unknown>
  extends Decoded<Map<K, V>> {
  readonly kind: 'map';
  readonly key: TypeDescriptor<K>;
  readonly value: TypeDescriptor<V>;
}

/**
 * A named type with no built-in shape. Decodable only through a decoder
 * registered with `registerDecoder`.
 */
export interface CustomDescriptor<T = unknown> extends Decoded<T> {
  readonly kind: 'custom';
  readonly name: string;
}

/**
 * Delegate-like member type. Never decoded, never reported as present or
 * missing.
 */
export interface CallbackDescriptor<F = (...args: never[]) => unknown>
  extends Decoded<F> {
  readonly kind: 'callback';
}

/**
 * Explicit read/write access for accessor members.
 *
 * Without `set` the member is read-only: it is still decoded (so a container
 * returned by `get` is merge-updated in place), but the result is never
 * written back.
 */
export interface MemberAccess<T> {
  get(instance: T): unknown;
  set?(instance: T, value: unknown): void;
}

/**
 * Per-member policy flags.
 *
 * Precedence: member flag > type policy > call-site options > process default.
 */
export interface MemberFlags {
  /** Required regardless of the active options. */
  readonly mandatory?: boolean;
  /** Absence counts as set; the current value is kept. */
  readonly allowMissing?: boolean;
  /** Never decoded, never counted as present or missing. */
  readonly ignore?: boolean;
  /** Explicit document key, replacing the derived exposed name. */
  readonly key?: string;
}

export type MemberType = TypeDescriptor | (() => TypeDescriptor);

export interface MemberSpec<T> extends MemberFlags {
  readonly type: MemberType;
  readonly access?: MemberAccess<T>;
}

/**
 * A member declaration inside {@link RecordDefinition.members}: a bare
 * descriptor, a thunk returning one (for self-referencing records), or a full
 * {@link MemberSpec}.
 */
export type MemberInput<T> = MemberType | MemberSpec<T>;

/**
 * Type-level policy markers.
 *
 * `mandatory` and `allowMissing` override the call-site missing-field option
 * in either direction (`allowMissing` wins when both are set).
 * `frameworkBase` marks an opaque base type: any record whose root ancestor
 * carries it never checks for missing fields.
 */
export interface RecordPolicy {
  readonly mandatory?: boolean;
  readonly allowMissing?: boolean;
  readonly frameworkBase?: boolean;
}

export type RecordSemantics = 'reference' | 'value';

/**
 * Declarative description of a record type.
 *
 * Hooks are declared with method syntax so a `RecordDescriptor<Point>` stays
 * assignable wherever a `RecordDescriptor<object>` is expected.
 */
export interface RecordDefinition<T extends object> {
  readonly name: string;
  /** Ordered members. Object literal order is declaration order. */
  readonly members: Readonly<Record<string, MemberInput<T>>>;
  /** Parent record whose members are inherited and listed first. */
  readonly base?: RecordDescriptor<object>;
  /** @default 'reference' */
  readonly semantics?: RecordSemantics;
  readonly policy?: RecordPolicy;

  /** Allocates a default instance when there is no existing one. */
  create(): T;
  /**
   * Copies a value-semantics instance before it is populated.
   * Defaults to a shallow copy onto `create()`.
   */
  copy?(instance: T): T;
  /** Custom full-type decoder; replaces member-wise population. */
  fromDoc?(existing: T | null, node: DocumentNode): T;
  /** Runs after every successful decode of this type; may replace the instance. */
  postDoc?(instance: T): T;
}

export interface RecordDescriptor<T extends object = object>
  extends RecordDefinition<T>,
    Decoded<T> {
  readonly kind: 'record';
}

/**
 * Closed union of every shape the engine dispatches on.
 */
export type AnyDescriptor =
  | ScalarDescriptor
  | EnumDescriptor
  | OptionalDescriptor
  | ArrayDescriptor
  | MultiArrayDescriptor
  | SequenceDescriptor
  | MapDescriptor
  | RecordDescriptor
  | CustomDescriptor
  | CallbackDescriptor;

export type DescriptorKind = AnyDescriptor['kind'];

/**
 * A descriptor known to decode to `T`.
 */
export type TypeDescriptor<T = unknown> = AnyDescriptor & Decoded<T>;
