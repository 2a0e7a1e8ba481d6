import { ContractViolationError } from './errors';
import { isRecord } from './guards';
import { type Logger, createDefaultLogger } from './logger';
import { ALL_OPTIONS, ReificationOptions } from './options';

export interface Settings {
  /** Options used when a call passes none. */
  readonly defaultOptions: ReificationOptions;
  /** Deepest document nesting a single call will descend into. */
  readonly maxDepth: number;
  readonly logger: Logger;
}

export const DEFAULT_MAX_DEPTH = 256;

export const DEFAULT_OPTIONS: ReificationOptions =
  ReificationOptions.AllowMissingExtraFields | ReificationOptions.CaseSensitive;

function defaults(): Settings {
  return {
    defaultOptions: DEFAULT_OPTIONS,
    maxDepth: DEFAULT_MAX_DEPTH,
    logger: createDefaultLogger()
  };
}

let current: Settings = defaults();

export function getSettings(): Settings {
  return current;
}

function isLogger(value: unknown): value is Logger {
  return (
    isRecord(value) &&
    typeof value.debug === 'function' &&
    typeof value.warn === 'function' &&
    typeof value.child === 'function'
  );
}

/**
 * Validates a settings patch at run time.
 *
 * Callers may come from untyped code (JSON config, JS), so each field is
 * checked before anything is applied.
 *
 * @throws ContractViolationError listing the first invalid field.
 */
function validateSettingsPatch(patch: unknown): asserts patch is Partial<Settings> {
  if (!isRecord(patch)) {
    throw new ContractViolationError('Settings must be an object');
  }

  const { defaultOptions, maxDepth, logger } = patch;

  if (
    defaultOptions !== undefined &&
    (typeof defaultOptions !== 'number' ||
      !Number.isInteger(defaultOptions) ||
      defaultOptions < 0 ||
      defaultOptions > ALL_OPTIONS)
  ) {
    throw new ContractViolationError(
      `Settings.defaultOptions must be an integer in 0..${ALL_OPTIONS}`
    );
  }

  if (
    maxDepth !== undefined &&
    (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1)
  ) {
    throw new ContractViolationError(
      'Settings.maxDepth must be a positive integer'
    );
  }

  if (logger !== undefined && !isLogger(logger)) {
    throw new ContractViolationError('Settings.logger must be a pino logger');
  }
}

/**
 * Merges `patch` into the process-wide settings.
 *
 * Intended as a setup step before decoding starts.
 */
export function configure(patch: Partial<Settings>): Settings {
  validateSettingsPatch(patch);
  current = {
    defaultOptions: patch.defaultOptions ?? current.defaultOptions,
    maxDepth: patch.maxDepth ?? current.maxDepth,
    logger: patch.logger ?? current.logger
  };
  return current;
}

export function resetSettings(): Settings {
  current = defaults();
  return current;
}
