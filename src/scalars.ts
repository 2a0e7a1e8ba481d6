/**
 * Scalar conversion
 * -----------------
 * Converts scalar document text into typed values, independent of the host
 * locale: `.` is the only decimal separator, there are no digit group
 * separators, and surrounding whitespace is ignored.
 *
 * Value mapping:
 * - `bool`                         -> boolean (`true` / `false`, any case)
 * - 8/16/32-bit integers, floats   -> number
 * - 64-bit integers                -> bigint (beyond `Number.MAX_SAFE_INTEGER`)
 * - `char`                         -> string of exactly one UTF-16 code unit
 * - `string`                       -> the text, verbatim (no trimming)
 *
 * Integers are range-checked against their width; float32 values are rounded
 * with `Math.fround`. Failures throw a plain `Error`; the engine wraps it with
 * the node location.
 */

export type IntegerKind =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32';

export type BigIntegerKind = 'int64' | 'uint64';

export type FloatKind = 'float32' | 'float64';

export type ScalarKind =
  | 'bool'
  | IntegerKind
  | BigIntegerKind
  | FloatKind
  | 'char'
  | 'string';

/**
 * Maps each scalar kind to the TypeScript type it decodes to.
 */
export type ScalarValue<K extends ScalarKind> = K extends 'bool'
  ? boolean
  : K extends BigIntegerKind
    ? bigint
    : K extends IntegerKind | FloatKind
      ? number
      : string;

const INTEGER_RANGES: Readonly<Record<IntegerKind, readonly [number, number]>> =
  {
    int8: [-128, 127],
    uint8: [0, 255],
    int16: [-32768, 32767],
    uint16: [0, 65535],
    int32: [-2147483648, 2147483647],
    uint32: [0, 4294967295]
  };

const BIG_INTEGER_RANGES: Readonly<
  Record<BigIntegerKind, readonly [bigint, bigint]>
> = {
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n]
};

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIALS: ReadonlyMap<string, number> = new Map([
  ['nan', NaN],
  ['infinity', Infinity],
  ['+infinity', Infinity],
  ['-infinity', -Infinity]
]);

function isIntegerKind(kind: ScalarKind): kind is IntegerKind {
  return Object.hasOwn(INTEGER_RANGES, kind);
}

function isBigIntegerKind(kind: ScalarKind): kind is BigIntegerKind {
  return Object.hasOwn(BIG_INTEGER_RANGES, kind);
}

function invalid(kind: ScalarKind, text: string, reason?: string): Error {
  return new Error(
    `Invalid ${kind} value "${text}"${reason ? ` (${reason})` : ''}`
  );
}

function parseBool(text: string): boolean {
  switch (text.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw invalid('bool', text);
  }
}

function parseInteger(kind: IntegerKind, text: string): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) throw invalid(kind, text);

  const value = Number(trimmed);
  const [min, max] = INTEGER_RANGES[kind];
  if (value < min || value > max) {
    throw invalid(kind, text, `out of range ${min}..${max}`);
  }
  // Normalizes "-0" to 0.
  return value === 0 ? 0 : value;
}

function parseBigInteger(kind: BigIntegerKind, text: string): bigint {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) throw invalid(kind, text);

  const value = BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
  const [min, max] = BIG_INTEGER_RANGES[kind];
  if (value < min || value > max) {
    throw invalid(kind, text, `out of range ${min}..${max}`);
  }
  return value;
}

function parseFloatValue(kind: FloatKind, text: string): number {
  const trimmed = text.trim();

  const special = FLOAT_SPECIALS.get(trimmed.toLowerCase());
  if (special !== undefined) return special;

  if (!FLOAT_PATTERN.test(trimmed)) throw invalid(kind, text);

  const value = kind === 'float32' ? Math.fround(Number(trimmed)) : Number(trimmed);
  if (!Number.isFinite(value)) {
    throw invalid(kind, text, 'overflow');
  }
  return value;
}

function parseChar(text: string): string {
  if (text.length !== 1) {
    throw invalid('char', text, 'expected exactly one character');
  }
  return text;
}

/**
 * Parses scalar text as the given kind.
 *
 * @param kind The target scalar kind.
 * @param text Scalar node text.
 * @returns The typed value (see the value mapping above).
 * @throws Error when the text is not a valid literal of `kind`.
 */
export function parseScalar<K extends ScalarKind>(
  kind: K,
  text: string
): ScalarValue<K>;

export function parseScalar(
  kind: ScalarKind,
  text: string
): unknown {
  if (kind === 'bool') return parseBool(text);
  if (isIntegerKind(kind)) return parseInteger(kind, text);
  if (isBigIntegerKind(kind)) return parseBigInteger(kind, text);

  switch (kind) {
    case 'float32':
    case 'float64':
      return parseFloatValue(kind, text);
    case 'char':
      return parseChar(text);
    case 'string':
      return text;
  }
}
