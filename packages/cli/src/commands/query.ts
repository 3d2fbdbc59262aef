import type { Command } from 'commander';
import { scoped, type Database, type SqliteValue } from '@sqlcell/sqlite';
import { bindParams } from '../lib/params.js';
import { formatTable, rowsToJson, type QueryResult } from '../lib/format.js';
import { createLogger } from '../lib/logger.js';
import {
  runCommand,
  withCommandDatabase,
  type CommandIO,
  type GlobalOptions,
} from '../lib/command-runtime.js';

interface QueryOptions {
  param?: string[];
  json?: boolean;
}

/**
 * Step through every row, reading cells through one Column per result
 * column. The columns track the statement's current row, so they are drawn
 * once and reused.
 */
export function queryRows(db: Database, sql: string, params: readonly string[] = []): QueryResult {
  return scoped(db.prepare(sql), (statement) => {
    bindParams(statement, params);

    const columns = Array.from({ length: statement.getColumnCount() }, (_, index) =>
      statement.getColumnName(index),
    );
    const cells = columns.map((_, index) => statement.getColumn(index));
    const rows: SqliteValue[][] = [];
    try {
      while (statement.executeStep()) {
        rows.push(cells.map((cell) => cell.getValue()));
      }
    } finally {
      for (const cell of cells) {
        cell.release();
      }
    }
    return { columns, rows };
  });
}

export function registerQueryCommand(program: Command, io: CommandIO): void {
  program
    .command('query')
    .description('Run a query and print its rows')
    .argument('<file>', 'Database file')
    .argument('<sql>', 'SQL text')
    .option('-p, --param <value...>', 'Positional parameter values')
    .option('--json', 'Output as JSON')
    .action((file: string, sql: string, _options: QueryOptions, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & QueryOptions>();
      const logger = createLogger({ verbose: options.verbose, output: io.err });

      runCommand(options.json, () => {
        const result = withCommandDatabase(file, options, logger, (db) =>
          queryRows(db, sql, options.param ?? []),
        );

        if (options.json) {
          io.out(JSON.stringify(rowsToJson(result), null, 2));
          return;
        }
        for (const line of formatTable(result)) {
          io.out(line);
        }
      });
    });
}
