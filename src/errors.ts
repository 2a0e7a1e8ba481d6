import type { ErrorWrappingBoundary } from './architecture';
import { type SourceLocation, formatLocation } from './document/location';
import { formatNameList } from './report';

/**
 * Base class for every failure raised by this library.
 *
 * The rendered location is appended to the message so that a plain
 * `console.error(error.message)` already points at the offending document
 * position. The structured `location` stays available for tooling.
 *
 * See {@link ErrorWrappingBoundary} for how failures travel through nested
 * decode calls.
 */
export class ReifyError extends Error {
  readonly name: string = 'ReifyError';
  readonly location: SourceLocation | undefined;

  constructor(
    message: string,
    location?: SourceLocation,
    options?: ErrorOptions
  ) {
    super(
      location ? `${message} (at ${formatLocation(location)})` : message,
      options
    );
    this.location = location;
  }
}

/**
 * Input could not be converted to the target shape: unparsable scalar text, a
 * node of the wrong kind, a jagged multi-dimensional array, or a failure thrown
 * by user code (custom decoder, post-populate hook) while decoding.
 *
 * `path` is the member path from the decode root to the failing value
 * (e.g. `"Config.enemies[2].speed"`).
 */
export class ConversionError extends ReifyError {
  readonly name: string = 'ConversionError';
  readonly path: string;

  constructor(
    message: string,
    location: SourceLocation,
    path: string,
    options?: ErrorOptions
  ) {
    super(path ? `${path}: ${message}` : message, location, options);
    this.path = path;
  }
}

/**
 * The target descriptor has no built-in shape handling and no registered
 * custom decoder.
 */
export class UnsupportedTypeError extends ConversionError {
  readonly name: string = 'UnsupportedTypeError';
  readonly typeName: string;

  constructor(typeName: string, location: SourceLocation, path: string) {
    super(`Don't know how to update value of type ${typeName}`, location, path);
    this.typeName = typeName;
  }
}

/**
 * Case-insensitive member lookup matched more than one key of the same map
 * (e.g. both `Speed` and `speed` are present).
 */
export class AmbiguousKeyError extends ConversionError {
  readonly name: string = 'AmbiguousKeyError';
  readonly member: string;
  readonly keys: readonly string[];

  constructor(
    member: string,
    keys: readonly string[],
    location: SourceLocation,
    path: string
  ) {
    super(
      `Member "${member}" matches several keys when case is ignored: ${formatNameList(keys)}`,
      location,
      path
    );
    this.member = member;
    this.keys = keys;
  }
}

/**
 * Required record members were not present in the input map.
 */
export class MissingFieldsError extends ReifyError {
  readonly name: string = 'MissingFieldsError';
  readonly fields: readonly string[];
  readonly typeName: string;

  constructor(
    typeName: string,
    fields: readonly string[],
    location: SourceLocation
  ) {
    super(
      `Missing doc fields for ${typeName}: ${formatNameList(fields)}`,
      location
    );
    this.fields = fields;
    this.typeName = typeName;
  }
}

/**
 * Input map keys did not correspond to any written record member.
 */
export class ExtraFieldsError extends ReifyError {
  readonly name: string = 'ExtraFieldsError';
  readonly fields: readonly string[];
  readonly typeName: string;

  constructor(
    typeName: string,
    fields: readonly string[],
    location: SourceLocation
  ) {
    super(
      `Extra doc fields for ${typeName}: ${formatNameList(fields)}`,
      location
    );
    this.fields = fields;
    this.typeName = typeName;
  }
}

/**
 * Programmer or schema error rather than bad input: a missing target
 * instance, single-member sugar applied to a multi-member record, an invalid
 * descriptor, or invalid settings. Not meant to be recovered from.
 */
export class ContractViolationError extends ReifyError {
  readonly name: string = 'ContractViolationError';
}

/**
 * Source text could not be turned into a document tree.
 */
export class DocumentSyntaxError extends ReifyError {
  readonly name: string = 'DocumentSyntaxError';
}
