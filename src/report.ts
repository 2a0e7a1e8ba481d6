/**
 * Diagnostic formatting
 * ---------------------
 * Error messages produced by the reifier must stay readable even when a
 * document carries dozens of unknown keys or a record misses most of its
 * members. Name lists are therefore rendered as a bounded preview followed by
 * a truncation indicator, e.g.:
 *
 *   `volume, pitch, loop, … (4 more)`
 *
 * The structured data (the complete list) is always available on the error
 * object itself; only the message is truncated.
 */

/**
 * Default number of names listed before truncation.
 */
export const DEFAULT_PREVIEW_LIMIT = 5;

/**
 * Formats a limited preview list of names.
 *
 * @param names - Names to list, in reporting order
 * @param limit - Maximum number of names to display; `0` disables the preview
 * @returns Comma-separated names with a truncation suffix when `names` exceeds
 *          `limit`; an empty string when `names` is empty
 */
export function formatNameList(
  names: readonly string[],
  limit: number = DEFAULT_PREVIEW_LIMIT
): string {
  if (names.length === 0) return '';
  if (limit <= 0) return `… (${names.length} more)`;

  const items = names.slice(0, limit);

  // Truncation indicator
  if (names.length > limit) {
    items.push(`… (${names.length - limit} more)`);
  }

  return items.join(', ');
}

/**
 * Extracts a human-readable message from an arbitrary thrown value.
 *
 * Custom decoders and hooks are user code and may throw anything; non-Error
 * values are stringified so the wrapping error still says something useful.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return `Non-error value thrown: ${String(cause)}`;
}
