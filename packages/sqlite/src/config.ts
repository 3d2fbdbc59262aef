import { z } from 'zod';
import { silentLogger, type Logger } from './logger.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function isLogger(value: unknown): value is Logger {
  if (typeof value !== 'object' || value === null) return false;
  return LOG_LEVELS.every((level) => typeof Reflect.get(value, level) === 'function');
}

export const queryLogSchema = z.object({
  /** Log every executed statement, not just slow ones. */
  logAll: z.boolean().default(false),
  slowQueryThresholdMs: z.number().nonnegative().default(50),
  /** Include bound parameter values in query log lines. */
  logParams: z.boolean().default(false),
});

export const databaseOptionsSchema = queryLogSchema
  .extend({
    /** How long the engine waits on a locked database before failing with SQLITE_BUSY. */
    busyTimeoutMs: z.number().int().nonnegative().default(5000),
    logger: z
      .custom<Logger>(isLogger, { message: 'logger must implement debug, info, warn and error' })
      .default(silentLogger),
  })
  .strict();

export type QueryLogConfig = z.output<typeof queryLogSchema>;
export type DatabaseOptions = z.input<typeof databaseOptionsSchema>;
export type ResolvedDatabaseOptions = z.output<typeof databaseOptionsSchema>;

/**
 * Validate database options and fill in defaults.
 *
 * @throws ZodError when an option has the wrong type or is unknown
 */
export function parseDatabaseOptions(options: DatabaseOptions = {}): ResolvedDatabaseOptions {
  return databaseOptionsSchema.parse(options);
}
