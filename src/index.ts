/**
 * Public API.
 *
 * Typical use:
 * ```ts
 * import { defineRecord, parseDocument, reify, t } from 'doc-reifier';
 *
 * const Point = defineRecord<Point>({
 *   name: 'Point',
 *   create: () => ({ x: 0, y: 0 }),
 *   members: { x: t.int32(), y: t.int32() }
 * });
 *
 * const point = reify(Point, null, parseDocument('{ x: 3, y: 4 }'));
 * ```
 */

// Descriptors
export * from './types';
export { record as defineRecord } from './types/builders';

// Documents
export {
  type DocumentNode,
  type DocumentNodeKind,
  type MapDocument,
  type ScalarDocument,
  type SequenceDocument,
  MapNode,
  ScalarNode,
  SequenceNode,
  describeNode,
  isDocumentNode
} from './document/nodes';
export { type SourceLocation, formatLocation } from './document/location';
export { fromValue, toPlainValue } from './document/from-value';
export { type ParseDocumentOptions, parseDocument } from './document/parser';

// Decoding
export {
  type ReifyResult,
  type ValueHandle,
  reify,
  safeReify,
  setFieldsOnObject,
  setFieldsOnValue
} from './entry';
export { ReificationOptions } from './options';
export { NdArray } from './multi-array';
export { exposedNameOf, getTypeInfo } from './metadata/type-info';
export type { MemberInfo, TypeInfo } from './metadata/type-info';

// Extension points
export {
  type Decoder,
  type RegisteredDecoder,
  getDecoder,
  hasDecoder,
  registerDecoder,
  unregisterDecoder
} from './registry';
export {
  schemaDecoder,
  toStandardSchema,
  validateWithSchema
} from './standard-schema';

// Settings
export {
  type Settings,
  DEFAULT_MAX_DEPTH,
  DEFAULT_OPTIONS,
  configure,
  getSettings,
  resetSettings
} from './settings';
export type { Logger } from './logger';

// Errors
export {
  AmbiguousKeyError,
  ContractViolationError,
  ConversionError,
  DocumentSyntaxError,
  ExtraFieldsError,
  MissingFieldsError,
  ReifyError,
  UnsupportedTypeError
} from './errors';
