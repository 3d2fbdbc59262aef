import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { registerExecCommand } from '../commands/exec.js';
import { registerQueryCommand } from '../commands/query.js';
import { registerTablesCommand } from '../commands/tables.js';
import {
  consoleIO,
  isCommandError,
  renderCommandError,
  type CommandIO,
} from './command-runtime.js';

export const VERSION = '0.1.0';

export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer number of milliseconds.');
  }
  return ms;
}

export function createProgram(io: CommandIO = consoleIO): Command {
  const program = new Command();

  program
    .name('sqlcell')
    .description('Query and inspect SQLite databases')
    .version(VERSION)
    .option('--readonly', 'Open the database read-only')
    .option('--create', 'Create the database file if it does not exist')
    .option('--timeout <ms>', 'Busy timeout in milliseconds', parseTimeout)
    .option('-v, --verbose', 'Log every statement')
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .exitOverride();

  registerQueryCommand(program, io);
  registerExecCommand(program, io);
  registerTablesCommand(program, io);

  return program;
}

/**
 * Parse `argv` (node-style, program path first) and run the command.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], io: CommandIO = consoleIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isCommandError(error)) {
      renderCommandError(error, io);
      return error.exitCode;
    }
    throw error;
  }
}
