import type { Command } from 'commander';
import chalk from 'chalk';
import type { Database } from '@sqlcell/sqlite';
import { createLogger } from '../lib/logger.js';
import {
  runCommand,
  withCommandDatabase,
  type CommandIO,
  type GlobalOptions,
} from '../lib/command-runtime.js';

interface ExecOptions {
  json?: boolean;
}

export interface ExecSummary {
  /** Rows changed by the last statement. */
  changes: number;
  /** Rows changed by every statement of the script. */
  totalChanges: number;
  lastInsertRowid: bigint;
}

/** Run one or more `;`-separated statements that return no rows. */
export function execScript(db: Database, sql: string): ExecSummary {
  const before = db.totalChangesCount();
  const changes = db.exec(sql);
  return {
    changes,
    totalChanges: db.totalChangesCount() - before,
    lastInsertRowid: db.lastInsertRowid(),
  };
}

export function registerExecCommand(program: Command, io: CommandIO): void {
  program
    .command('exec')
    .description('Run statements and report how many rows changed')
    .argument('<file>', 'Database file')
    .argument('<sql>', 'SQL text; may hold several statements')
    .option('--json', 'Output as JSON')
    .action((file: string, sql: string, _options: ExecOptions, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & ExecOptions>();
      const logger = createLogger({ verbose: options.verbose, output: io.err });

      runCommand(options.json, () => {
        const summary = withCommandDatabase(file, options, logger, (db) => execScript(db, sql));

        if (options.json) {
          io.out(JSON.stringify({
            success: true,
            changes: summary.changes,
            totalChanges: summary.totalChanges,
            lastInsertRowid: summary.lastInsertRowid.toString(),
          }));
          return;
        }
        io.out(chalk.green(`✓ ${summary.totalChanges} ${summary.totalChanges === 1 ? 'row' : 'rows'} changed`));
      });
    });
}
