import type { parseDocument } from './document/parser';
import type { tryResolveStaticValue } from './document/static-resolver';
import type { getTypeInfo } from './metadata/type-info';
import type { resolveRecordPolicy } from './options';

/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * DEFINITION
 * 1. Static Document Sources
 * 2. Shape Dispatch
 *
 * POLICY
 * 3. Merge-Update Policy
 * 4. Policy Precedence
 * 5. Validation After Mutation
 *
 * STRATEGY
 * 6. Error Wrapping Boundary
 *
 * Recommended reading flow:
 * DEFINITION -> POLICY -> STRATEGY
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 */

/**
 * ARCHITECTURAL DEFINITION (1)
 * Static Document Sources
 *
 * ---
 *
 * The engine consumes `DocumentNode` trees only. Two adapters produce them:
 *
 * - `fromValue`: in-memory JSON-like data (typically `JSON.parse` output).
 *   Nodes are located by logical path (`defaults#enemies[1].hp`).
 *
 * - {@link parseDocument}: source text holding a single object or array
 *   literal. The text is parsed as an ESTree expression and converted without
 *   executing anything, so only static data is accepted:
 *
 *   1. Leaves resolved by {@link tryResolveStaticValue}: string, number,
 *      bigint, boolean and `null` literals, `NaN`, `Infinity`, signed
 *      numbers and template literals whose interpolations are static.
 *   2. Arrays whose elements are static (no holes, no spread).
 *   3. Objects whose keys are identifiers, strings or numbers and whose
 *      values are static (no spread, methods, accessors or computed keys).
 *
 *   Anything else is rejected with a located `DocumentSyntaxError`; nothing
 *   is silently dropped.
 *
 * Both adapters render every scalar as text. Typing happens only in the
 * engine, driven by the target descriptor.
 */
export type StaticDocumentSources = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Shape Dispatch
 *
 * ---
 *
 * A descriptor's `kind` selects exactly one decode path, first match wins:
 *
 *   scalar -> enum -> optional -> registered decoder
 *     -> array -> multiArray -> sequence -> map -> record
 *     -> unsupported
 *
 * Notes
 * -----
 * - `optional` checks for the scalar text `null` before looking at the inner
 *   type, so `null` is accepted even where the inner type would reject it.
 * - A registered decoder replaces every shape after it, including a record's
 *   member-wise population and its own `fromDoc` hook.
 * - Record member metadata is computed once per descriptor by
 *   {@link getTypeInfo}; the dispatch itself holds no state.
 */
export type ShapeDispatch = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Merge-Update Policy
 *
 * ---
 *
 * Decoding into an existing value must preserve what the document does not
 * change:
 *
 * - Records (reference semantics), sequences and maps are updated in place.
 *   Their identity never changes.
 * - Record members, sequence slots and map values that survive are fed to the
 *   nested decode as existing values, so nested records keep their identity.
 * - Fixed arrays keep their identity only while their length (or, for
 *   multi-dimensional arrays, their shape) is unchanged. Otherwise a new
 *   array is allocated and the overlapping region is carried over before the
 *   element decode runs.
 * - Sequences drop tail elements beyond the new length; maps drop keys the
 *   document no longer mentions.
 * - Value-semantics records are copied before population; the caller's copy
 *   is never written.
 *
 * Callers must use the returned value as the result. It is the same object
 * for in-place updates, but that must not be assumed.
 */
export type MergeUpdatePolicy = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Policy Precedence
 *
 * ---
 *
 * Missing/extra-field checks and the case rule come from four layers; the
 * more specific layer wins:
 *
 *   member flag > type policy > call-site options > process default
 *
 * Resolution ({@link resolveRecordPolicy}):
 * 1. Call-site options (or `Settings.defaultOptions`) give the three checks.
 * 2. Type `mandatory` forces the missing check on, type `allowMissing` forces
 *    it off.
 * 3. A record whose root ancestor is marked `frameworkBase` never checks for
 *    missing fields.
 * 4. Per member: `ignore` (and callback-typed members) skip the member
 *    entirely, `mandatory` makes it required regardless of the layers above,
 *    `allowMissing` counts it as set when absent.
 */
export type PolicyPrecedence = never;

/**
 * ARCHITECTURAL POLICY (5)
 * Validation After Mutation
 *
 * ---
 *
 * Extra-field and missing-field checks run after all members present in the
 * document have been written. A failing populate call therefore leaves the
 * target partially updated. There is no rollback.
 *
 * Callers that need all-or-nothing updates must decode into a copy:
 * `setFieldsOnValue` does exactly that and only publishes the copy on success.
 *
 * Order: the extra-field check runs first, then the missing-field check.
 */
export type ValidationAfterMutation = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Error Wrapping Boundary
 *
 * ---
 *
 * Every nested decode call is a boundary:
 *
 * - A `ReifyError` (conversion, missing/extra fields, contract violation)
 *   passes through unchanged. It already names its location.
 * - Anything else thrown below (scalar parse failures, user decoders,
 *   `fromDoc` / `postDoc` hooks, schema validators) is wrapped once as a
 *   `ConversionError` with the node location, the member path from the
 *   decode root, and the original error as `cause`.
 *
 * The innermost frame that sees a foreign error wraps it, so the reported
 * location is the most specific one available.
 */
export type ErrorWrappingBoundary = never;
