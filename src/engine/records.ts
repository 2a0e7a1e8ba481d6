import type {
  PolicyPrecedence,
  ValidationAfterMutation
} from '../architecture';
import {
  type DocumentNode,
  type MapDocument,
  describeNode
} from '../document/nodes';
import {
  AmbiguousKeyError,
  ContractViolationError,
  ExtraFieldsError,
  MissingFieldsError
} from '../errors';
import {
  type MemberInfo,
  type TypeInfo,
  getTypeInfo
} from '../metadata/type-info';
import { type EffectivePolicy, resolveRecordPolicy } from '../options';
import type { RecordDescriptor } from '../types/descriptors';
import { type Frame, childFrame } from './frame';
import { reifyValue } from './reify';

export function isInstance(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function foldCase(name: string): string {
  return name.toUpperCase();
}

function isDecodable(member: MemberInfo): boolean {
  return !member.ignore && member.type.kind !== 'callback';
}

/**
 * Finds the input node for `member`.
 *
 * Case-sensitive lookup is exact. Case-insensitive lookup folds both sides and
 * must match at most one key; several matches raise
 * {@link AmbiguousKeyError}.
 */
export function findMemberNode(
  map: MapDocument,
  name: string,
  ignoreCase: boolean,
  frame: Frame
): DocumentNode | undefined {
  if (!ignoreCase) return map.get(name);

  const folded = foldCase(name);
  const matches = map.pairs.filter(([key]) => foldCase(key) === folded);
  if (matches.length > 1) {
    throw new AmbiguousKeyError(
      name,
      matches.map(([key]) => key),
      map.location,
      frame.path
    );
  }
  return matches[0]?.[1];
}

function readMember(member: MemberInfo, instance: object): unknown {
  if (member.access) return member.access.get(instance);
  const value: unknown = Reflect.get(instance, member.name);
  return value;
}

function writeMember(member: MemberInfo, instance: object, value: unknown): void {
  if (member.access) {
    // Read-only accessors are decoded (containers update in place) but never
    // assigned.
    member.access.set?.(instance, value);
    return;
  }
  Reflect.set(instance, member.name, value);
}

function setMember(
  member: MemberInfo,
  instance: object,
  node: DocumentNode,
  frame: Frame
): void {
  const current = readMember(member, instance) ?? null;
  writeMember(member, instance, reifyValue(member.type, current, node, frame));
}

/**
 * Single-value form: a scalar or sequence node populates the one decodable
 * member of a wrapper record.
 *
 * @throws ContractViolationError if the record has any other number of
 *   decodable members.
 */
function populateSingle(
  info: TypeInfo,
  instance: object,
  node: DocumentNode,
  frame: Frame
): void {
  const decodable = info.members.filter(isDecodable);
  if (decodable.length !== 1) {
    throw new ContractViolationError(
      `Cannot set ${info.name} from ${describeNode(node)}: the single-value form needs exactly one decodable member, ${info.name} has ${decodable.length}`,
      node.location
    );
  }
  const [member] = decodable;
  setMember(member, instance, node, childFrame(frame, member.exposedName));
}

function collectExtraKeys(
  map: MapDocument,
  setNames: readonly string[],
  policy: EffectivePolicy
): string[] {
  const normalize = policy.ignoreCase ? foldCase : (name: string) => name;
  const known = new Set(setNames.map(normalize));
  return map.pairs.map(([key]) => key).filter((key) => !known.has(normalize(key)));
}

/**
 * Writes the members of `instance` from `node`.
 *
 * Steps:
 * 1. Non-map input goes through the single-value form.
 * 2. Resolve the effective policy ({@link PolicyPrecedence}).
 * 3. For each decodable member in declaration order: record it as required
 *    when the missing check is on or it is mandatory; decode it when its key
 *    is present; count it as set when absent but `allowMissing`.
 * 4. Reject unmatched input keys, then unset required members.
 *
 * Validation runs after every write ({@link ValidationAfterMutation}): on
 * failure `instance` keeps the members already written.
 *
 * @throws ExtraFieldsError
 * @throws MissingFieldsError
 */
export function populateRecord(
  info: TypeInfo,
  instance: object,
  node: DocumentNode,
  frame: Frame
): object {
  if (node.kind !== 'map') {
    populateSingle(info, instance, node, frame);
    return instance;
  }

  const policy = resolveRecordPolicy(
    frame.options,
    info.policy,
    info.frameworkBase
  );

  const required: string[] = [];
  const setNames: string[] = [];
  let anyMandatory = false;

  for (const member of info.members) {
    anyMandatory ||= member.mandatory;
    if (!isDecodable(member)) continue;

    const name = member.exposedName;
    if (policy.checkMissing || member.mandatory) required.push(name);

    const valueNode = findMemberNode(node, name, policy.ignoreCase, frame);
    if (valueNode) {
      setMember(member, instance, valueNode, childFrame(frame, name));
      setNames.push(name);
    } else if (member.allowMissing) {
      setNames.push(name);
    }
  }

  if (policy.checkExtra) {
    const extra = collectExtraKeys(node, setNames, policy);
    if (extra.length > 0) {
      throw new ExtraFieldsError(info.name, extra, node.location);
    }
  }

  if (policy.checkMissing || anyMandatory) {
    const missing = required.filter((name) => !setNames.includes(name));
    if (missing.length > 0) {
      throw new MissingFieldsError(info.name, missing, node.location);
    }
  }

  return instance;
}

/**
 * Runs the record's post-populate hook, if any.
 */
export function runPostDoc(type: RecordDescriptor, instance: object): object {
  const { postDoc } = getTypeInfo(type);
  return postDoc ? postDoc(instance) : instance;
}

/**
 * Record dispatch: the record's own `fromDoc` hook when present, otherwise
 * member-wise population of the existing instance or of a fresh `create()`.
 * For value semantics both paths receive a copy of the existing instance.
 * The post-populate hook runs last.
 */
export function reifyRecord(
  type: RecordDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): object {
  const info = getTypeInfo(type);
  const current = isInstance(existing) ? existing : null;
  // Value records never see the caller's instance, whichever path decodes.
  const target =
    current !== null && info.semantics === 'value' ? info.copy(current) : current;

  let instance: object;
  if (info.fromDoc) {
    instance = info.fromDoc(target, node);
  } else {
    instance = populateRecord(info, target ?? info.create(), node, frame);
  }

  return info.postDoc ? info.postDoc(instance) : instance;
}
