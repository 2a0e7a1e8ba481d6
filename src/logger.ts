import { env } from 'node:process';
import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Library-wide default logger.
 *
 * Quiet by default (`warn`); set `LOG_LEVEL=debug` to trace container
 * reallocation and decoder registration, or hand a child logger of the
 * host application to `configure({ logger })`.
 */
export function createDefaultLogger(): Logger {
  return pino({
    name: 'doc-reifier',
    level: env.LOG_LEVEL ?? 'warn'
  });
}
