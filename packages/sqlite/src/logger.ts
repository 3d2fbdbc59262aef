/**
 * Logging contract shared by the library and the CLI.
 *
 * The library never writes to the console on its own; it logs through
 * whatever `Logger` the database was opened with.
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Silent logger (default for databases, and for tests)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
