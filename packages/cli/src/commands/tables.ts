import type { Command } from 'commander';
import { scoped, type Database } from '@sqlcell/sqlite';
import { createLogger } from '../lib/logger.js';
import {
  runCommand,
  withCommandDatabase,
  type CommandIO,
  type GlobalOptions,
} from '../lib/command-runtime.js';

interface TablesOptions {
  json?: boolean;
}

const LIST_TABLES_SQL =
  "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name";

export function listTables(db: Database): string[] {
  return scoped(db.prepare(LIST_TABLES_SQL), (statement) => {
    const names: string[] = [];
    while (statement.executeStep()) {
      names.push(scoped(statement.getColumn('name'), (column) => column.getText()));
    }
    return names;
  });
}

export function registerTablesCommand(program: Command, io: CommandIO): void {
  program
    .command('tables')
    .description('List the tables of a database')
    .argument('<file>', 'Database file')
    .option('--json', 'Output as JSON')
    .action((file: string, _options: TablesOptions, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & TablesOptions>();
      const logger = createLogger({ verbose: options.verbose, output: io.err });

      runCommand(options.json, () => {
        const names = withCommandDatabase(file, options, logger, listTables);

        if (options.json) {
          io.out(JSON.stringify(names));
          return;
        }
        for (const name of names) {
          io.out(name);
        }
      });
    });
}
