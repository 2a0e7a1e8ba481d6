import { is, type types } from 'estree-toolkit';
import { parse } from 'meriyah';

import { DocumentSyntaxError } from '../errors';
import { isRecord } from '../guards';
import { describeCause } from '../report';
import { extractPropertyKey } from './key-extractor';
import type { SourceLocation } from './location';
import {
  type DocumentNode,
  MapNode,
  ScalarNode,
  SequenceNode
} from './nodes';
import { tryResolveScalarText } from './static-resolver';

export type ParseDocumentOptions = {
  /**
   * Label used as the location source (typically the file name).
   * @default '<inline>'
   */
  source?: string;
};

/**
 * Parses configuration text written as a JavaScript object or array literal
 * into a located document tree. JSON is a subset of the accepted syntax.
 *
 * Accepted (static data only):
 * - object literals with static keys (identifiers, strings, numbers)
 * - array literals without holes or spreads
 * - string, number, bigint, boolean and `null` literals
 * - `NaN`, `Infinity`, signed numbers, static template literals
 * - comments and trailing commas
 *
 * Everything else (identifiers, calls, spreads, getters, methods, dynamic
 * computed keys) is rejected with the position of the offending expression,
 * because a reified configuration must not depend on evaluation.
 *
 * Example:
 * ```ts
 * const doc = parseDocument('{ speed: 2.5, tags: ["fast"] }', { source: 'ship.cfg' });
 * // doc.kind === 'map'; doc.get('speed') is scalar "2.5" located at ship.cfg:1:10
 * ```
 *
 * @throws DocumentSyntaxError
 *   On parse errors and on non-static expressions.
 */
export function parseDocument(
  code: string,
  options: ParseDocumentOptions = {}
): DocumentNode {
  const source = options.source ?? '<inline>';
  const expression = parseExpression(code, source);
  return convertExpression(expression, source);
}

/**
 * Checks whether a runtime value is "node-like" enough to be treated as an
 * ESTree node for the purpose of `estree-toolkit` type guards.
 */
function isNodeLike(value: unknown): value is types.Node {
  return (
    isRecord(value) && !Array.isArray(value) && typeof value.type === 'string'
  );
}

/**
 * Parses source text as a single expression.
 *
 * The input is wrapped in parentheses so that object literals parse as
 * expressions rather than block statements. The newline before the closing
 * parenthesis keeps a trailing line comment from swallowing it.
 */
function parseExpression(code: string, source: string): types.Node {
  let ast: unknown;
  try {
    ast = parse(`(${code}\n)`, { loc: true, raw: true });
  } catch (error) {
    throw new DocumentSyntaxError(
      `Invalid document syntax: ${describeCause(error)}`,
      { source },
      { cause: error }
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new DocumentSyntaxError(
      'Expected parser output to be an ESTree Program node.',
      { source }
    );
  }

  const [first, ...rest] = ast.body;
  if (!first || rest.length > 0 || !is.expressionStatement(first)) {
    throw new DocumentSyntaxError(
      'Expected the document to be a single expression.',
      { source }
    );
  }

  return first.expression;
}

/**
 * Maps an ESTree position back to the caller's text.
 *
 * meriyah columns are 0-based; document locations are 1-based. On the first
 * line the wrapping parenthesis shifts every column right by one, which
 * cancels out the 0 → 1 conversion.
 */
function locate(node: types.Node, source: string): SourceLocation {
  const start = node.loc?.start;
  if (!start) return { source };

  const column = start.line === 1 ? start.column : start.column + 1;
  return { source, line: start.line, column };
}

/**
 * Recursively converts a static ESTree expression into a document node.
 *
 * 1. Scalars: anything the static resolver accepts. Numbers keep the text
 *    they were written with.
 * 2. ArrayExpression -> sequence. Holes and spreads are rejected: a sequence
 *    is position-addressed and a missing slot would shift every later index.
 * 3. ObjectExpression -> map. Spreads, methods, getters/setters and dynamic
 *    keys are rejected; duplicate keys are rejected by {@link MapNode}.
 * 4. Anything else is not static data.
 */
function convertExpression(node: types.Node, source: string): DocumentNode {
  const location = locate(node, source);

  // 1. Scalars
  const scalar = tryResolveScalarText(node);
  if (scalar.success) {
    return new ScalarNode(scalar.value, location);
  }

  // 2. Sequences
  if (is.arrayExpression(node)) {
    const items: DocumentNode[] = [];
    for (const [index, element] of node.elements.entries()) {
      if (element === null) {
        throw new DocumentSyntaxError(
          `Array holes are not allowed (index ${index})`,
          location
        );
      }
      if (is.spreadElement(element)) {
        throw new DocumentSyntaxError(
          'Spread elements are not static data',
          locate(element, source)
        );
      }
      items.push(convertExpression(element, source));
    }
    return new SequenceNode(items, location);
  }

  // 3. Maps
  if (is.objectExpression(node)) {
    const pairs: (readonly [string, DocumentNode])[] = [];
    for (const property of node.properties) {
      if (!is.property(property)) {
        throw new DocumentSyntaxError(
          'Spread elements are not static data',
          locate(property, source)
        );
      }
      if (property.kind !== 'init' || property.method) {
        throw new DocumentSyntaxError(
          'Methods and accessors are not static data',
          locate(property, source)
        );
      }

      const key = extractPropertyKey(property);
      if (key === null) {
        throw new DocumentSyntaxError(
          'Property keys must be static strings or numbers',
          locate(property.key, source)
        );
      }

      pairs.push([key, convertExpression(property.value, source)]);
    }
    return new MapNode(pairs, location);
  }

  // 4. Not static data
  throw new DocumentSyntaxError(
    `Unsupported expression of type ${node.type}; only static data is allowed`,
    location
  );
}
