/**
 * Logger implementation for CLI
 */

import chalk from 'chalk';
import type { Logger } from '@sqlcell/sqlite';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Routes all log output through this instead of the console. */
  output?: (msg: string) => void;
}

function formatData(data: Record<string, unknown>): string {
  return ` ${JSON.stringify(data, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))}`;
}

/**
 * Create a logger instance
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, output } = opts;
  const write = output ?? ((msg: string) => console.error(msg));

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose && !quiet) {
        const dataStr = data ? formatData(data) : '';
        write(chalk.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      if (!quiet) {
        const dataStr = data && verbose ? formatData(data) : '';
        write(chalk.blue(`[info] ${msg}${dataStr}`));
      }
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? formatData(data) : '';
      write(chalk.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? formatData(data) : '';
      write(chalk.red(`[error] ${msg}${dataStr}`));
    },
  };
}
