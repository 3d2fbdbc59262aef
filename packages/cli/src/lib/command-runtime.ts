import chalk from 'chalk';
import {
  Database,
  OPEN_CREATE,
  OPEN_READONLY,
  OPEN_READWRITE,
  isDatabaseError,
  type Logger,
} from '@sqlcell/sqlite';

export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Options every command inherits from the program. */
export interface GlobalOptions {
  readonly?: boolean;
  create?: boolean;
  timeout?: number;
  verbose?: boolean;
}

interface CommandErrorOptions {
  message: string;
  json?: boolean;
  exitCode?: number;
  /** Engine result code name, shown next to the message. */
  codeName?: string;
  details?: string[];
}

export class CommandError extends Error {
  readonly json: boolean;
  readonly exitCode: number;
  readonly codeName?: string;
  readonly details: string[];

  constructor(options: CommandErrorOptions) {
    super(options.message);
    this.name = 'CommandError';
    this.json = options.json ?? false;
    this.exitCode = options.exitCode ?? 1;
    this.codeName = options.codeName;
    this.details = options.details ?? [];
  }
}

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}

export function renderCommandError(error: CommandError, io: CommandIO): void {
  if (error.json) {
    const payload = {
      success: false,
      error: error.message,
      ...(error.codeName ? { code: error.codeName } : {}),
    };
    io.out(JSON.stringify(payload));
    return;
  }

  const suffix = error.codeName ? ` (${error.codeName})` : '';
  io.err(chalk.red(`✗ ${error.message}${suffix}`));
  for (const detail of error.details) {
    io.err(detail);
  }
}

/**
 * Run a command body, turning database failures into a CommandError that
 * renders in the command's output mode. Anything else propagates.
 */
export function runCommand<T>(json: boolean | undefined, body: () => T): T {
  try {
    return body();
  } catch (error) {
    if (isDatabaseError(error)) {
      throw new CommandError({ message: error.message, codeName: error.codeName, json });
    }
    throw error;
  }
}

export function openFlags(options: GlobalOptions): number {
  if (options.readonly) {
    return OPEN_READONLY;
  }
  return OPEN_READWRITE | (options.create ? OPEN_CREATE : 0);
}

export function withCommandDatabase<T>(
  file: string,
  options: GlobalOptions,
  logger: Logger,
  callback: (db: Database) => T,
): T {
  const db = new Database(file, openFlags(options), {
    busyTimeoutMs: options.timeout,
    logAll: options.verbose,
    logger,
  });

  let result: T;
  try {
    result = callback(db);
  } catch (error) {
    // The callback's error wins; a close refused on the way out is only logged.
    try {
      db.close();
    } catch (closeError) {
      logger.warn('[sqlite] close failed', {
        filename: file,
        error: closeError instanceof Error ? closeError.message : String(closeError),
      });
    }
    throw error;
  }

  db.close();
  return result;
}
