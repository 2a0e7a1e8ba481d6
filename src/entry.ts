import type { MergeUpdatePolicy } from './architecture';
import type { DocumentNode } from './document/nodes';
import { rootFrame } from './engine/frame';
import { isInstance, populateRecord } from './engine/records';
import { reifyValue } from './engine/reify';
import { ContractViolationError, ReifyError } from './errors';
import { getTypeInfo } from './metadata/type-info';
import type { ReificationOptions } from './options';
import { getSettings } from './settings';
import { describeType } from './types/describe';
import type { RecordDescriptor, TypeDescriptor } from './types/descriptors';

/**
 * Mutable handle to a value-semantics record.
 */
export interface ValueHandle<T> {
  value: T;
}

export type ReifyResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: ReifyError };

/**
 * Decodes `node` as `type`, merge-updating `existing`.
 *
 * Containers (records, sequences, maps) are updated in place where possible;
 * the returned value is the only source of truth afterwards
 * (see {@link MergeUpdatePolicy}).
 *
 * @param existing Current value, or `null` to construct a fresh one.
 * @param options  Option bits; the configured default when omitted.
 * @throws ReifyError (or a subclass) on any failure.
 */
export function reify<T>(
  type: TypeDescriptor<T>,
  existing: T | null,
  node: DocumentNode,
  options?: ReificationOptions
): T;

export function reify(
  type: TypeDescriptor,
  existing: unknown,
  node: DocumentNode,
  options?: ReificationOptions
): unknown {
  const frame = rootFrame(getSettings(), options, describeType(type));
  return reifyValue(type, existing, node, frame);
}

/**
 * {@link reify} returning a result object instead of throwing.
 *
 * Only library errors are captured; anything else (a bug, a stack overflow)
 * is rethrown.
 */
export function safeReify<T>(
  type: TypeDescriptor<T>,
  existing: T | null,
  node: DocumentNode,
  options?: ReificationOptions
): ReifyResult<T> {
  try {
    return { success: true, value: reify(type, existing, node, options) };
  } catch (error) {
    if (error instanceof ReifyError) return { success: false, error };
    throw error;
  }
}

/**
 * Writes the members of a reference-semantics record from a map document.
 *
 * Neither the record's `fromDoc` nor its `postDoc` hook runs: this is a
 * member-wise population of the given instance.
 *
 * @returns The populated instance.
 * @throws ContractViolationError if `instance` is `null` or `undefined`.
 */
export function setFieldsOnObject<T extends object>(
  type: RecordDescriptor<T>,
  instance: T | null | undefined,
  node: DocumentNode,
  options?: ReificationOptions
): T;

export function setFieldsOnObject(
  type: RecordDescriptor,
  instance: object | null | undefined,
  node: DocumentNode,
  options?: ReificationOptions
): object {
  if (!isInstance(instance)) {
    throw new ContractViolationError(
      `Can't set fields of ${type.name} on ${String(instance)}`,
      node.location
    );
  }
  const frame = rootFrame(getSettings(), options, type.name);
  return populateRecord(getTypeInfo(type), instance, node, frame);
}

/**
 * Writes the members of a value-semantics record held by `handle`.
 *
 * The current value is copied, the copy populated, and `handle.value`
 * replaced only when every check passed; on failure the handle still holds
 * the untouched original.
 */
export function setFieldsOnValue<T extends object>(
  type: RecordDescriptor<T>,
  handle: ValueHandle<T>,
  node: DocumentNode,
  options?: ReificationOptions
): T {
  const info = getTypeInfo(type);
  const copy = type.copy
    ? type.copy(handle.value)
    : Object.assign(type.create(), handle.value);
  const frame = rootFrame(getSettings(), options, type.name);

  populateRecord(info, copy, node, frame);
  handle.value = copy;
  return copy;
}
