import type { PolicyPrecedence } from './architecture';
import type { RecordPolicy } from './types/descriptors';

/**
 * Reification option bits. Combine with bitwise OR:
 *
 * ```ts
 * ReificationOptions.AllowExtraFields | ReificationOptions.CaseSensitive
 * ```
 *
 * A cleared bit means the stricter behavior: `None` checks for extra and
 * missing fields and matches member names case-insensitively.
 */
export const ReificationOptions = {
  None: 0,
  AllowExtraFields: 1,
  AllowMissingFields: 2,
  AllowMissingExtraFields: 3,
  CaseSensitive: 4
} as const;

export type ReificationOptions = number;

/** Highest valid options value (all bits set). */
export const ALL_OPTIONS =
  ReificationOptions.AllowMissingExtraFields | ReificationOptions.CaseSensitive;

export function hasOption(options: ReificationOptions, bit: number): boolean {
  return (options & bit) === bit;
}

/**
 * Effective record policy for one populate call.
 */
export interface EffectivePolicy {
  readonly ignoreCase: boolean;
  readonly checkMissing: boolean;
  readonly checkExtra: boolean;
}

/**
 * Resolves the effective policy of a record populate call.
 *
 * See {@link PolicyPrecedence}.
 *
 * Steps:
 * 1. Derive the three checks from the option bits.
 * 2. Type-level `mandatory` turns the missing check on; `allowMissing` then
 *    turns it off (so it wins when both are set).
 * 3. A `frameworkBase` root ancestor turns the missing check off regardless.
 *
 * Member-level flags are applied per member by the populator.
 */
export function resolveRecordPolicy(
  options: ReificationOptions,
  policy: RecordPolicy,
  frameworkBase: boolean
): EffectivePolicy {
  let checkMissing = !hasOption(options, ReificationOptions.AllowMissingFields);

  if (policy.mandatory) checkMissing = true;
  if (policy.allowMissing) checkMissing = false;
  if (frameworkBase) checkMissing = false;

  return {
    ignoreCase: !hasOption(options, ReificationOptions.CaseSensitive),
    checkMissing,
    checkExtra: !hasOption(options, ReificationOptions.AllowExtraFields)
  };
}
