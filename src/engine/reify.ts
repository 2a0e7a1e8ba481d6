import type { ErrorWrappingBoundary } from '../architecture';
import { type DocumentNode, describeNode } from '../document/nodes';
import { ConversionError, ReifyError, UnsupportedTypeError } from '../errors';
import { getDecoder } from '../registry';
import { describeCause } from '../report';
import { parseScalar } from '../scalars';
import { describeType } from '../types/describe';
import type { AnyDescriptor, EnumDescriptor } from '../types/descriptors';
import { reifyArray, reifyMultiArray, reifySequence } from './arrays';
import type { Frame } from './frame';
import { reifyMap } from './maps';
import { isInstance, reifyRecord, runPostDoc } from './records';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Scalar text of `node`, or a {@link ConversionError} for containers.
 */
export function scalarText(
  type: AnyDescriptor,
  node: DocumentNode,
  frame: Frame
): string {
  if (node.kind !== 'scalar') {
    throw new ConversionError(
      `Expected a scalar for ${describeType(type)}, got ${describeNode(node)}`,
      node.location,
      frame.path
    );
  }
  return node.text;
}

/**
 * Resolves an enum member by name (case-insensitive) or, for numeric enums,
 * by its integer value.
 */
function parseEnum(
  type: EnumDescriptor,
  node: DocumentNode,
  frame: Frame
): string | number {
  const text = scalarText(type, node, frame).trim();

  const byName = type.values.get(text.toUpperCase());
  if (byName !== undefined) return byName;

  if (INTEGER_TEXT.test(text)) {
    const numeric = Number(text);
    for (const value of type.values.values()) {
      if (value === numeric) return value;
    }
  }

  throw new ConversionError(
    `"${text}" is not a member of enum ${type.name}`,
    node.location,
    frame.path
  );
}

/**
 * Shape dispatch, first match wins.
 *
 * 1. scalar, enum, optional (`null` short-circuits before the inner type)
 * 2. registered decoder (replaces every built-in shape below)
 * 3. array, multiArray, sequence, map, record
 * 4. anything else (custom without decoder, callback) is unsupported
 */
function dispatch(
  type: AnyDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): unknown {
  switch (type.kind) {
    case 'scalar':
      return parseScalar(type.scalar, scalarText(type, node, frame));
    case 'enum':
      return parseEnum(type, node, frame);
    case 'optional':
      if (node.kind === 'scalar' && node.text === 'null') return null;
      return dispatch(type.inner, existing, node, frame);
  }

  const decoder = getDecoder(type);
  if (decoder) {
    const decoded = decoder.decode(existing ?? null, node);
    return type.kind === 'record' && isInstance(decoded)
      ? runPostDoc(type, decoded)
      : decoded;
  }

  switch (type.kind) {
    case 'array':
      return reifyArray(type, existing, node, frame);
    case 'multiArray':
      return reifyMultiArray(type, existing, node, frame);
    case 'sequence':
      return reifySequence(type, existing, node, frame);
    case 'map':
      return reifyMap(type, existing, node, frame);
    case 'record':
      return reifyRecord(type, existing, node, frame);
    case 'custom':
    case 'callback':
      throw new UnsupportedTypeError(
        describeType(type),
        node.location,
        frame.path
      );
  }
}

/**
 * Decodes `node` as `type`, merge-updating `existing` where the shape allows.
 *
 * Error boundary (see {@link ErrorWrappingBoundary}): a {@link ReifyError}
 * raised below passes through unchanged; anything else (scalar parse
 * failures, user decoders, hooks) is wrapped once as a
 * {@link ConversionError} carrying this node's location and member path.
 *
 * @throws ConversionError when `frame.depth` exceeds `frame.maxDepth`.
 */
export function reifyValue(
  type: AnyDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): unknown {
  if (frame.depth > frame.maxDepth) {
    throw new ConversionError(
      `Document nesting exceeds the maximum depth of ${frame.maxDepth}`,
      node.location,
      frame.path
    );
  }

  try {
    return dispatch(type, existing, node, frame);
  } catch (error) {
    if (error instanceof ReifyError) throw error;
    throw new ConversionError(
      `Cannot decode ${describeType(type)} from ${describeNode(node)}: ${describeCause(error)}`,
      node.location,
      frame.path,
      { cause: error }
    );
  }
}
