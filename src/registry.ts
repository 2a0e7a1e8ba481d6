import type { DocumentNode } from './document/nodes';
import { getSettings } from './settings';
import { ContractViolationError } from './errors';
import type {
  AnyDescriptor,
  DescriptorKind,
  TypeDescriptor
} from './types/descriptors';
import { describeType } from './types/describe';

/**
 * User-supplied decoder for one target type.
 *
 * Receives the existing value (`null` when there is none) and the raw node,
 * and returns the new value. Thrown errors are wrapped by the engine with the
 * node location.
 */
export type Decoder<T> = (existing: T | null, node: DocumentNode) => T;

export interface RegisteredDecoder {
  readonly name: string;
  decode(existing: unknown, node: DocumentNode): unknown;
}

/**
 * Process-wide decoder table keyed by descriptor identity.
 *
 * Registration is a setup step; every decode of a registered type reads it.
 */
const decoders = new Map<AnyDescriptor, RegisteredDecoder>();

/**
 * Kinds the engine resolves before the registry is consulted.
 */
const BUILT_IN_KINDS: ReadonlySet<DescriptorKind> = new Set<DescriptorKind>([
  'scalar',
  'enum',
  'optional'
]);

/**
 * Registers `decoder` for `type`, replacing any previous decoder.
 *
 * A registered decoder takes precedence over every container shape, including
 * record population and the record's own `fromDoc` hook.
 *
 * @throws ContractViolationError for scalar, enum and optional descriptors,
 *   which never reach the registry.
 */
export function registerDecoder<T>(
  type: TypeDescriptor<T>,
  decoder: Decoder<T>
): void {
  const name = describeType(type);
  if (BUILT_IN_KINDS.has(type.kind)) {
    throw new ContractViolationError(
      `Cannot register a decoder for ${name}: ${type.kind} types are always decoded by the engine; use t.custom() for a new type`
    );
  }

  const { logger } = getSettings();

  if (decoders.has(type)) {
    logger.warn({ type: name }, 'Replacing registered decoder');
  } else {
    logger.debug({ type: name }, 'Registered decoder');
  }

  // `decode` is a method signature, so the typed decoder is accepted as-is.
  decoders.set(type, { name, decode: decoder });
}

/**
 * @returns `true` if a decoder was registered for `type`.
 */
export function unregisterDecoder(type: AnyDescriptor): boolean {
  return decoders.delete(type);
}

export function hasDecoder(type: AnyDescriptor): boolean {
  return decoders.has(type);
}

/**
 * Type-erased lookup used by the engine.
 */
export function getDecoder(type: AnyDescriptor): RegisteredDecoder | undefined {
  return decoders.get(type);
}
