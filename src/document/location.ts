/**
 * Where a document node came from.
 *
 * Locations are opaque to the engine: they are carried through unchanged and
 * only rendered when an error message is built.
 *
 * - `source`: file name or any caller-chosen label (e.g. `"settings.json"`).
 * - `line` / `column`: 1-based position, present when the tree was produced by
 *   a text parser.
 * - `path`: logical position inside the document (e.g. `"items[2].id"`),
 *   present when the tree was built from in-memory data.
 */
export type SourceLocation = {
  readonly source: string;
  readonly line?: number;
  readonly column?: number;
  readonly path?: string;
};

/**
 * Renders a location for diagnostics.
 *
 * Example:
 *   { source: "game.cfg", line: 3, column: 7 } -> "game.cfg:3:7"
 *   { source: "defaults", path: "items[0]" }   -> "defaults#items[0]"
 *   { source: "defaults" }                     -> "defaults"
 */
export function formatLocation(location: SourceLocation): string {
  if (location.line != null) {
    return `${location.source}:${location.line}:${location.column ?? 1}`;
  }
  if (location.path) {
    return `${location.source}#${location.path}`;
  }
  return location.source;
}

/**
 * Builds a human-readable path label for diagnostics.
 *
 * String segments are appended using dot notation, numeric segments use bracket
 * notation. An empty base yields the bare segment.
 *
 * Example:
 *   formatPath("Config", "items") -> "Config.items"
 *   formatPath("Config.items", 0) -> "Config.items[0]"
 *   formatPath("", "items")       -> "items"
 */
export function formatPath(base: string, segment: string | number): string {
  if (typeof segment === 'number') return `${base}[${segment}]`;
  return base ? `${base}.${segment}` : segment;
}
