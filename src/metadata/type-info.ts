import type { DocumentNode } from '../document/nodes';
import { ContractViolationError } from '../errors';
import type {
  AnyDescriptor,
  MemberAccess,
  MemberInput,
  MemberSpec,
  MemberType,
  RecordDescriptor,
  RecordPolicy,
  RecordSemantics
} from '../types/descriptors';

/**
 * Resolved description of one decodable record member.
 */
export interface MemberInfo {
  /** Name as declared in `members`. */
  readonly name: string;
  /** Document key the member is looked up by. */
  readonly exposedName: string;
  readonly type: AnyDescriptor;
  readonly mandatory: boolean;
  readonly allowMissing: boolean;
  readonly ignore: boolean;
  /** Present for accessor members; fields are plain properties. */
  readonly access: MemberAccess<object> | undefined;
}

/**
 * Everything the populator needs about a record, computed once per record
 * descriptor.
 */
export interface TypeInfo {
  readonly name: string;
  /** Base members first, then own members, each in declaration order. */
  readonly members: readonly MemberInfo[];
  readonly policy: RecordPolicy;
  /** The root ancestor (or the record itself) is marked `frameworkBase`. */
  readonly frameworkBase: boolean;
  readonly semantics: RecordSemantics;
  readonly create: () => object;
  readonly copy: (instance: object) => object;
  readonly fromDoc:
    | ((existing: object | null, node: DocumentNode) => object)
    | undefined;
  readonly postDoc: ((instance: object) => object) | undefined;
}

const cache = new WeakMap<RecordDescriptor, TypeInfo>();

const HIDDEN_PREFIX = /^(?:m_|_)/;

/**
 * Document key for a declared member name: a leading `m_` or `_` is dropped
 * (`m_speed` and `_speed` are both exposed as `speed`).
 */
export function exposedNameOf(name: string): string {
  const stripped = name.replace(HIDDEN_PREFIX, '');
  return stripped === '' ? name : stripped;
}

function isMemberType(input: MemberInput<object>): input is MemberType {
  return typeof input === 'function' || 'kind' in input;
}

function toSpec(input: MemberInput<object>): MemberSpec<object> {
  return isMemberType(input) ? { type: input } : input;
}

function resolveType(type: MemberType): AnyDescriptor {
  return typeof type === 'function' ? type() : type;
}

function rootOf(record: RecordDescriptor): RecordDescriptor {
  let current = record;
  while (current.base) current = current.base;
  return current;
}

/**
 * Builds the info for `record`.
 *
 * Steps:
 * 1. Inherit the base record's resolved members (recursively cached).
 * 2. Normalize every own member input into a spec and resolve thunks.
 * 3. Reject duplicate exposed names across the flattened list.
 * 4. Bind hooks and the copy strategy.
 */
function buildTypeInfo(record: RecordDescriptor): TypeInfo {
  const inherited = record.base ? getTypeInfo(record.base).members : [];
  const members: MemberInfo[] = [...inherited];
  const seen = new Map<string, string>();
  for (const member of members) seen.set(member.exposedName, member.name);

  for (const [name, input] of Object.entries(record.members)) {
    const spec = toSpec(input);
    const exposedName = spec.key ?? exposedNameOf(name);

    const clash = seen.get(exposedName);
    if (clash !== undefined) {
      throw new ContractViolationError(
        `Record ${record.name} exposes "${exposedName}" twice (members ${clash} and ${name})`
      );
    }
    seen.set(exposedName, name);

    members.push({
      name,
      exposedName,
      type: resolveType(spec.type),
      mandatory: spec.mandatory ?? false,
      allowMissing: spec.allowMissing ?? false,
      ignore: spec.ignore ?? false,
      access: spec.access
    });
  }

  const copy = record.copy
    ? record.copy.bind(record)
    : (instance: object) => Object.assign(record.create(), instance);

  return {
    name: record.name,
    members,
    policy: record.policy ?? {},
    frameworkBase: rootOf(record).policy?.frameworkBase ?? false,
    semantics: record.semantics ?? 'reference',
    create: record.create.bind(record),
    copy,
    fromDoc: record.fromDoc?.bind(record),
    postDoc: record.postDoc?.bind(record)
  };
}

/**
 * Cached {@link TypeInfo} lookup keyed by record descriptor identity.
 *
 * Built on first use and never invalidated; descriptors are immutable.
 *
 * @throws ContractViolationError when two members share an exposed name.
 */
export function getTypeInfo(record: RecordDescriptor): TypeInfo {
  let info = cache.get(record);
  if (!info) {
    info = buildTypeInfo(record);
    cache.set(record, info);
  }
  return info;
}
