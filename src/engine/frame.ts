import { formatPath } from '../document/location';
import type { Logger } from '../logger';
import type { ReificationOptions } from '../options';
import type { Settings } from '../settings';

/**
 * Per-call decode state, passed down by value.
 *
 * A frame is never mutated: each nested decode gets its own child frame, so
 * concurrent or re-entrant calls share nothing.
 */
export interface Frame {
  readonly options: ReificationOptions;
  readonly maxDepth: number;
  readonly logger: Logger;
  /** Member path from the decode root, e.g. `Config.enemies[2].speed`. */
  readonly path: string;
  readonly depth: number;
}

export function rootFrame(
  settings: Settings,
  options: ReificationOptions | undefined,
  path: string
): Frame {
  return {
    options: options ?? settings.defaultOptions,
    maxDepth: settings.maxDepth,
    logger: settings.logger,
    path,
    depth: 0
  };
}

export function childFrame(frame: Frame, segment: string | number): Frame {
  return {
    ...frame,
    path: formatPath(frame.path, segment),
    depth: frame.depth + 1
  };
}
