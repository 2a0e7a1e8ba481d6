import { DocumentSyntaxError } from '../errors';
import { isRecord } from '../guards';
import type { SourceLocation } from './location';

/**
 * Document tree contract consumed by the reifier.
 *
 * A document is the parsed, dynamically-typed form of a configuration file:
 * maps, sequences and scalars. The reifier never mutates a node and relies
 * only on the members declared here, so any parser (YAML, TOML, the bundled
 * {@link parseDocument}) can feed it by implementing these three interfaces.
 *
 * Every node carries a {@link SourceLocation}, used only for diagnostics.
 */
export type DocumentNode = MapDocument | SequenceDocument | ScalarDocument;

export type DocumentNodeKind = DocumentNode['kind'];

/**
 * Ordered key → node pairs. Keys are unique within one map.
 */
export interface MapDocument {
  readonly kind: 'map';
  readonly location: SourceLocation;
  readonly pairs: readonly (readonly [key: string, value: DocumentNode])[];
  readonly count: number;

  /** Exact (case-sensitive) lookup. */
  get(key: string): DocumentNode | undefined;
}

/**
 * Ordered, index-addressable list of nodes.
 */
export interface SequenceDocument {
  readonly kind: 'sequence';
  readonly location: SourceLocation;
  readonly items: readonly DocumentNode[];
  readonly count: number;
}

/**
 * A leaf. The text is converted to typed values by the reifier; the node
 * itself performs no interpretation.
 */
export interface ScalarDocument {
  readonly kind: 'scalar';
  readonly location: SourceLocation;
  readonly text: string;
}

export class MapNode implements MapDocument {
  readonly kind = 'map';
  readonly location: SourceLocation;
  readonly pairs: readonly (readonly [key: string, value: DocumentNode])[];
  readonly #index: ReadonlyMap<string, DocumentNode>;

  /**
   * @throws DocumentSyntaxError if a key occurs twice.
   */
  constructor(
    pairs: Iterable<readonly [string, DocumentNode]>,
    location: SourceLocation
  ) {
    const index = new Map<string, DocumentNode>();
    const ordered: (readonly [string, DocumentNode])[] = [];

    for (const [key, value] of pairs) {
      if (index.has(key)) {
        throw new DocumentSyntaxError(`Duplicate key "${key}"`, value.location);
      }
      index.set(key, value);
      ordered.push([key, value]);
    }

    this.location = location;
    this.pairs = ordered;
    this.#index = index;
  }

  get count(): number {
    return this.pairs.length;
  }

  get(key: string): DocumentNode | undefined {
    return this.#index.get(key);
  }
}

export class SequenceNode implements SequenceDocument {
  readonly kind = 'sequence';
  readonly location: SourceLocation;
  readonly items: readonly DocumentNode[];

  constructor(items: readonly DocumentNode[], location: SourceLocation) {
    this.items = items;
    this.location = location;
  }

  get count(): number {
    return this.items.length;
  }
}

export class ScalarNode implements ScalarDocument {
  readonly kind = 'scalar';
  readonly location: SourceLocation;
  readonly text: string;

  constructor(text: string, location: SourceLocation) {
    this.text = text;
    this.location = location;
  }
}

/**
 * Short description of a node used in error messages
 * (e.g. `map with 2 keys`, `scalar "abc"`).
 */
export function describeNode(node: DocumentNode): string {
  switch (node.kind) {
    case 'map':
      return `map with ${node.count} ${node.count === 1 ? 'key' : 'keys'}`;
    case 'sequence':
      return `sequence of ${node.count} ${node.count === 1 ? 'item' : 'items'}`;
    case 'scalar':
      return `scalar "${node.text}"`;
  }
}

/**
 * Structural guard for values implementing the {@link DocumentNode} contract.
 *
 * Checks the discriminant, the location and the kind-specific payload, so a
 * tree produced by a third-party parser is accepted without relying on the
 * bundled node classes.
 */
export function isDocumentNode(value: unknown): value is DocumentNode {
  if (!isRecord(value) || !isRecord(value.location)) return false;

  switch (value.kind) {
    case 'map':
      return Array.isArray(value.pairs) && typeof value.get === 'function';
    case 'sequence':
      return Array.isArray(value.items);
    case 'scalar':
      return typeof value.text === 'string';
    default:
      return false;
  }
}
