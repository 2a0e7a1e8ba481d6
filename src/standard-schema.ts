import type { StandardSchemaV1 } from '@standard-schema/spec';
import { fromValue, toPlainValue } from './document/from-value';
import { type DocumentNode, isDocumentNode } from './document/nodes';
import { reify } from './entry';
import { ReifyError } from './errors';
import type { ReificationOptions } from './options';
import type { Decoder } from './registry';
import type { TypeDescriptor } from './types/descriptors';

export const VENDOR = 'doc-reifier';

function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string | undefined {
  if (!path || path.length === 0) return undefined;
  return path
    .map((segment) =>
      String(typeof segment === 'object' ? segment.key : segment)
    )
    .join('.');
}

/**
 * Validates a value with a Standard Schema V1 compliant validator.
 *
 * About `~standard`:
 * The property is the universal adapter defined by Standard Schema; it lets
 * Zod, Valibot, ArkType and others be used without library-specific code. Its
 * `validate` reports a result object and never throws.
 *
 * Implementation Note - Overloads:
 * The public signature carries the schema's output type; the implementation
 * returns `unknown` so no assertion is needed on the return statements.
 *
 * @param label Name used in error messages (usually the target type).
 * @throws
 * - If the schema object has no `~standard` property.
 * - If the validator returns a Promise (decoding is synchronous).
 * - If validation reports issues (the first one is quoted).
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  label: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  label: string
): unknown {
  // Guards against plain objects passed from untyped code.
  if (!('~standard' in schema)) {
    throw new Error(
      `The schema for "${label}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot).`
    );
  }

  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new Error(`Async schema validation is not supported for "${label}".`);
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = formatIssuePath(firstIssue.path);
    throw new Error(
      issuePath
        ? `Invalid ${label} at "${issuePath}": ${firstIssue.message}`
        : `Invalid ${label}: ${firstIssue.message}`
    );
  }

  return 'value' in result ? result.value : input;
}

/**
 * Custom decoder backed by a synchronous Standard Schema.
 *
 * The node is converted with {@link toPlainValue} (scalars stay strings, so
 * numeric schemas should coerce) and validated. The existing value is
 * ignored: schema output always replaces it.
 *
 * ```ts
 * registerDecoder(Color, schemaDecoder(z.string().regex(/^#[0-9a-f]{6}$/), 'Color'));
 * ```
 */
export function schemaDecoder<S extends StandardSchemaV1>(
  schema: S,
  label = 'value'
): Decoder<StandardSchemaV1.InferOutput<S>> {
  return (_existing, node) => validateWithSchema(schema, toPlainValue(node), label);
}

function toNode(value: unknown): DocumentNode {
  return isDocumentNode(value) ? value : fromValue(value, '<input>');
}

/**
 * Exposes a descriptor as a Standard Schema V1 validator.
 *
 * Accepts a {@link DocumentNode} or plain JSON-like data and always decodes
 * into a fresh value. Library errors become a single issue; anything else
 * propagates.
 */
export function toStandardSchema<T>(
  type: TypeDescriptor<T>,
  options?: ReificationOptions
): StandardSchemaV1<unknown, T> {
  return {
    '~standard': {
      version: 1,
      vendor: VENDOR,
      validate(value) {
        try {
          return { value: reify(type, null, toNode(value), options) };
        } catch (error) {
          if (error instanceof ReifyError) {
            return { issues: [{ message: error.message }] };
          }
          throw error;
        }
      }
    }
  };
}
