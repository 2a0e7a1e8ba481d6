import { type DocumentNode, describeNode } from '../document/nodes';
import { ConversionError } from '../errors';
import { isArray } from '../guards';
import { NdArray, isNdArray } from '../multi-array';
import { describeType } from '../types/describe';
import type {
  ArrayDescriptor,
  MultiArrayDescriptor,
  SequenceDescriptor
} from '../types/descriptors';
import { type Frame, childFrame } from './frame';
import { reifyValue } from './reify';

type ListDescriptor = ArrayDescriptor | MultiArrayDescriptor | SequenceDescriptor;

function itemsOf(
  type: ListDescriptor,
  node: DocumentNode,
  frame: Frame
): readonly DocumentNode[] {
  if (node.kind !== 'sequence') {
    throw new ConversionError(
      `Expected a sequence for ${describeType(type)}, got ${describeNode(node)}`,
      node.location,
      frame.path
    );
  }
  return node.items;
}

/**
 * Fixed-length array (rank 1).
 *
 * An existing array of the right length is updated in place. Otherwise a new
 * array is allocated and the leading elements that still fit are carried
 * over, so they are fed to the element decode as existing values.
 */
export function reifyArray(
  type: ArrayDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): unknown[] {
  const items = itemsOf(type, node, frame);
  if (items.length === 0) return [];

  let target: unknown[];
  if (!isArray(existing)) {
    target = new Array<unknown>(items.length).fill(null);
  } else if (existing.length !== items.length) {
    frame.logger.debug(
      { path: frame.path, from: existing.length, to: items.length },
      'Reallocating fixed array'
    );
    target = new Array<unknown>(items.length).fill(null);
    const carried = Math.min(existing.length, items.length);
    for (let i = 0; i < carried; i++) target[i] = existing[i];
  } else {
    target = existing;
  }

  for (const [i, item] of items.entries()) {
    target[i] = reifyValue(type.element, target[i], item, childFrame(frame, i));
  }
  return target;
}

/**
 * Shape of a rectangular nested sequence, read along index 0 of every level.
 */
function measure(
  type: MultiArrayDescriptor,
  node: DocumentNode,
  frame: Frame
): number[] {
  const lengths: number[] = [];
  let current = node;

  for (let dimension = 0; dimension < type.rank; dimension++) {
    const items = itemsOf(type, current, frame);
    lengths.push(items.length);
    if (items.length === 0) {
      // Remaining dimensions are unobservable; treat them as empty.
      while (lengths.length < type.rank) lengths.push(0);
      break;
    }
    current = items[0];
  }

  return lengths;
}

/**
 * Rejects jagged input: every sequence at depth `d` must have `lengths[d]`
 * items.
 */
function assertRectangular(
  type: MultiArrayDescriptor,
  node: DocumentNode,
  lengths: readonly number[],
  dimension: number,
  frame: Frame
): void {
  const items = itemsOf(type, node, frame);
  if (items.length !== lengths[dimension]) {
    throw new ConversionError(
      `Jagged ${describeType(type)}: expected ${lengths[dimension]} items in dimension ${dimension}, got ${items.length}`,
      node.location,
      frame.path
    );
  }
  if (dimension === lengths.length - 1) return;
  for (const [i, item] of items.entries()) {
    assertRectangular(type, item, lengths, dimension + 1, childFrame(frame, i));
  }
}

function sameShape(array: NdArray<unknown>, lengths: readonly number[]): boolean {
  return (
    array.rank === lengths.length &&
    lengths.every((length, dimension) => array.getLength(dimension) === length)
  );
}

/**
 * Copies the index ranges both arrays share, dimension by dimension.
 */
function copyOverlap(
  from: NdArray<unknown>,
  to: NdArray<unknown>,
  index: number[] = []
): void {
  const dimension = index.length;
  const shared = Math.min(from.getLength(dimension), to.getLength(dimension));

  for (let i = 0; i < shared; i++) {
    const next = [...index, i];
    if (dimension === to.rank - 1) {
      to.set(next, from.get(next));
    } else {
      copyOverlap(from, to, next);
    }
  }
}

/**
 * Rectangular array of rank >= 2.
 *
 * Steps:
 * 1. Empty input yields an empty array of the right rank.
 * 2. Measure the shape and reject jagged input.
 * 3. Reuse an existing array of the same shape; otherwise allocate and copy
 *    the overlapping region of an existing array of the same rank.
 * 4. Decode every element with the (possibly carried-over) existing value.
 */
export function reifyMultiArray(
  type: MultiArrayDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): NdArray<unknown> {
  const items = itemsOf(type, node, frame);
  if (items.length === 0) return NdArray.empty(type.rank);

  const lengths = measure(type, node, frame);
  assertRectangular(type, node, lengths, 0, frame);

  let target: NdArray<unknown>;
  if (isNdArray(existing) && sameShape(existing, lengths)) {
    target = existing;
  } else {
    target = new NdArray<unknown>(lengths);
    if (isNdArray(existing) && existing.rank === type.rank) {
      frame.logger.debug(
        { path: frame.path, from: existing.lengths, to: lengths },
        'Reallocating multi-dimensional array'
      );
      copyOverlap(existing, target);
    }
  }

  const visit = (current: DocumentNode, index: number[], at: Frame): void => {
    for (const [i, item] of itemsOf(type, current, at).entries()) {
      const next = [...index, i];
      const itemFrame = childFrame(at, i);
      if (next.length === type.rank) {
        target.set(
          next,
          reifyValue(type.element, target.get(next) ?? null, item, itemFrame)
        );
      } else {
        visit(item, next, itemFrame);
      }
    }
  };
  visit(node, [], frame);

  return target;
}

/**
 * Resizable sequence, always updated in place.
 *
 * Tail elements beyond the input length are dropped, surviving slots are
 * merge-updated, and missing slots are appended from fresh decodes.
 */
export function reifySequence(
  type: SequenceDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): unknown[] {
  const items = itemsOf(type, node, frame);
  const target: unknown[] = isArray(existing) ? existing : [];

  if (target.length > items.length) {
    frame.logger.debug(
      { path: frame.path, from: target.length, to: items.length },
      'Truncating sequence'
    );
    target.length = items.length;
  }

  for (let i = 0; i < target.length; i++) {
    target[i] = reifyValue(type.element, target[i], items[i], childFrame(frame, i));
  }

  while (target.length < items.length) {
    const i = target.length;
    target.push(reifyValue(type.element, null, items[i], childFrame(frame, i)));
  }

  return target;
}
