import { type DocumentNode, ScalarNode, describeNode } from '../document/nodes';
import { ConversionError } from '../errors';
import { isMap } from '../guards';
import { describeType } from '../types/describe';
import type { MapDescriptor } from '../types/descriptors';
import { type Frame, childFrame } from './frame';
import { reifyValue } from './reify';

/**
 * Associative map, always updated in place.
 *
 * Each input key is decoded through `type.key` from a scalar node carrying
 * the map's location. Values under keys that already exist are merge-updated.
 * Keys the input no longer mentions are removed afterwards, so the final key
 * set equals the input's.
 */
export function reifyMap(
  type: MapDescriptor,
  existing: unknown,
  node: DocumentNode,
  frame: Frame
): Map<unknown, unknown> {
  if (node.kind !== 'map') {
    throw new ConversionError(
      `Expected a map for ${describeType(type)}, got ${describeNode(node)}`,
      node.location,
      frame.path
    );
  }

  const target = isMap(existing) ? existing : new Map<unknown, unknown>();
  const touched = new Set<unknown>();

  for (const [text, valueNode] of node.pairs) {
    const entryFrame = childFrame(frame, text);
    const key = reifyValue(
      type.key,
      null,
      new ScalarNode(text, node.location),
      entryFrame
    );
    const current = target.has(key) ? target.get(key) : null;

    target.set(key, reifyValue(type.value, current, valueNode, entryFrame));
    touched.add(key);
  }

  const stale = [...target.keys()].filter((key) => !touched.has(key));
  if (stale.length > 0) {
    frame.logger.debug(
      { path: frame.path, removed: stale.length },
      'Removing map keys absent from the document'
    );
    for (const key of stale) target.delete(key);
  }

  return target;
}
