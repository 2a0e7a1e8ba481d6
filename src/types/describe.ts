import type { AnyDescriptor } from './descriptors';

/**
 * Human-readable type name used in diagnostics and logs.
 *
 * Example:
 *   t.optional(t.int32())             -> "int32?"
 *   t.multiArray(t.float32(), 2)      -> "float32[,]"
 *   t.map(t.string(), Enemy)          -> "Map<string, Enemy>"
 */
export function describeType(type: AnyDescriptor): string {
  switch (type.kind) {
    case 'scalar':
      return type.scalar;
    case 'enum':
    case 'record':
    case 'custom':
      return type.name;
    case 'optional':
      return `${describeType(type.inner)}?`;
    case 'array':
      return `${describeType(type.element)}[]`;
    case 'multiArray':
      return `${describeType(type.element)}[${','.repeat(type.rank - 1)}]`;
    case 'sequence':
      return `Sequence<${describeType(type.element)}>`;
    case 'map':
      return `Map<${describeType(type.key)}, ${describeType(type.value)}>`;
    case 'callback':
      return 'callback';
  }
}
