/**
 * Database connection
 *
 * Owns one better-sqlite3 connection for its whole lifetime and is the only
 * place statement handles are created.
 *
 * Statements are not tracked per connection: every Statement (and every
 * Column drawn from it) must be done with before the Database is closed.
 * While a statement still has an open cursor the engine refuses the close.
 */

import BetterSqlite3 from 'better-sqlite3';
import type { Column } from './column.js';
import { parseDatabaseOptions, type DatabaseOptions, type QueryLogConfig, type ResolvedDatabaseOptions } from './config.js';
import {
  CloseError,
  DatabaseError,
  ExecError,
  OpenError,
  PrepareError,
  misuse,
  translateError,
  type DatabaseErrorClass,
} from './errors.js';
import type { Logger } from './logger.js';
import { StatementObserver, type StatementStats } from './observer.js';
import { scoped } from './scope.js';
import { StatementHandle, type StatementRef } from './statement-handle.js';
import { Statement } from './statement.js';

/** Open the database read-only. */
export const OPEN_READONLY = 0x01;
/** Open the database for reading and writing. */
export const OPEN_READWRITE = 0x02;
/** Create the database file when it does not exist (with OPEN_READWRITE). */
export const OPEN_CREATE = 0x04;

const MEMORY_FILENAME = ':memory:';

export type TransactionControl = 'BEGIN' | 'BEGIN IMMEDIATE' | 'BEGIN EXCLUSIVE' | 'COMMIT' | 'ROLLBACK';

type CounterQuery = 'SELECT changes()' | 'SELECT total_changes()' | 'SELECT last_insert_rowid()';

export class Database {
  private connection: BetterSqlite3.Database | null;
  private readonly options: ResolvedDatabaseOptions;
  private readonly observer: StatementObserver;
  private readonly counters = new Map<CounterQuery, BetterSqlite3.Statement>();

  /**
   * @param filename - Path to the database file, or ':memory:'
   * @param flags - OPEN_READONLY, or OPEN_READWRITE optionally with OPEN_CREATE
   * @throws OpenError when the connection cannot be opened
   * @throws ZodError when `options` is invalid
   */
  constructor(
    private readonly filename: string,
    private readonly flags: number = OPEN_READONLY,
    options: DatabaseOptions = {},
  ) {
    this.options = parseDatabaseOptions(options);
    this.observer = new StatementObserver(this.options.logger, {
      logAll: this.options.logAll,
      slowQueryThresholdMs: this.options.slowQueryThresholdMs,
      logParams: this.options.logParams,
    });

    const readonly = (flags & OPEN_READONLY) !== 0;
    const readwrite = (flags & OPEN_READWRITE) !== 0;
    if (readonly === readwrite) {
      throw misuse(OpenError, 'flags must include exactly one of OPEN_READONLY and OPEN_READWRITE');
    }
    const create = readwrite && (flags & OPEN_CREATE) !== 0;

    try {
      this.connection = new BetterSqlite3(filename, {
        readonly,
        fileMustExist: !create && filename !== MEMORY_FILENAME,
        timeout: this.options.busyTimeoutMs,
      });
    } catch (error) {
      throw translateError(OpenError, error);
    }

    this.options.logger.debug('[sqlite] opened', { filename, flags });
  }

  getFilename(): string {
    return this.filename;
  }

  getFlags(): number {
    return this.flags;
  }

  isOpen(): boolean {
    return this.connection !== null && this.connection.open;
  }

  inTransaction(): boolean {
    return this.live(DatabaseError).inTransaction;
  }

  getLogger(): Logger {
    return this.options.logger;
  }

  /**
   * @internal The single factory of statement handles for this connection.
   */
  acquireStatementHandle(sql: string): StatementRef {
    return StatementHandle.acquire(this.live(PrepareError), sql, this.observer);
  }

  /**
   * @throws PrepareError on malformed SQL or when the engine rejects it
   */
  prepare(sql: string): Statement {
    return new Statement(this, sql);
  }

  /**
   * Execute one or more statements, discarding any rows.
   *
   * @returns rows changed by the last INSERT, UPDATE or DELETE
   * @throws ExecError when the engine rejects the SQL
   */
  exec(sql: string): number {
    this.runExec(this.live(ExecError), sql);
    return this.changesCount();
  }

  /**
   * @internal BEGIN, COMMIT and ROLLBACK on behalf of Transaction.
   *
   * better-sqlite3 refuses `exec` while any statement cursor is open, but the
   * engine accepts these with pending reads, so the check is lifted for the
   * duration of the call.
   *
   * @throws ExecError when the engine rejects the statement
   */
  execTransactionControl(sql: TransactionControl): void {
    const connection = this.live(ExecError);
    connection.unsafeMode(true);
    try {
      this.runExec(connection, sql);
    } finally {
      connection.unsafeMode(false);
    }
  }

  /**
   * First column of the first row of `sql`.
   *
   * The returned Column keeps the statement handle alive on its own; release
   * it when done, as the cursor keeps the connection busy for writes until
   * then.
   *
   * @throws ExecError when the query returns no row
   */
  execAndGet(sql: string): Column {
    return scoped(this.prepare(sql), (statement) => {
      if (!statement.executeStep()) {
        throw new ExecError(`query returned no rows: ${sql}`, 'SQLITE_ERROR');
      }
      return statement.getColumn(0);
    });
  }

  tableExists(name: string): boolean {
    return scoped(
      this.prepare("SELECT count(*) FROM sqlite_master WHERE type = 'table' AND name = ?"),
      (statement) => {
        statement.bind(1, name).executeStep();
        return scoped(statement.getColumn(0), (column) => column.getInt() > 0);
      },
    );
  }

  /**
   * How long the engine retries on a locked database before SQLITE_BUSY.
   */
  setBusyTimeout(ms: number): void {
    if (!Number.isInteger(ms) || ms < 0) {
      throw misuse(ExecError, `busy timeout must be a non-negative integer: ${ms}`);
    }
    const connection = this.live(ExecError);
    try {
      connection.pragma(`busy_timeout = ${ms}`);
    } catch (error) {
      throw translateError(ExecError, error);
    }
  }

  lastInsertRowid(): bigint {
    return this.counter('SELECT last_insert_rowid()');
  }

  /** Rows changed by the most recent INSERT, UPDATE or DELETE. */
  changesCount(): number {
    return Number(this.counter('SELECT changes()'));
  }

  totalChangesCount(): number {
    return Number(this.counter('SELECT total_changes()'));
  }

  configureLogging(config: Partial<QueryLogConfig>): void {
    this.observer.configureLogging(config);
  }

  getStats(): Readonly<StatementStats> {
    return this.observer.getStatsSnapshot();
  }

  resetStats(): void {
    this.observer.resetStats();
  }

  /**
   * Close the connection. Closing twice is a no-op.
   *
   * @throws CloseError when the engine refuses, e.g. a statement cursor is
   *   still open; the connection then stays open
   */
  close(): void {
    const connection = this.connection;
    if (connection === null) return;

    try {
      connection.close();
    } catch (error) {
      throw translateError(CloseError, error);
    }

    this.connection = null;
    this.counters.clear();
    this.options.logger.debug('[sqlite] closed', {
      filename: this.filename,
      liveStatements: this.observer.getStatsSnapshot().live,
    });
  }

  private live<E extends DatabaseError>(ErrorClass: DatabaseErrorClass<E>): BetterSqlite3.Database {
    if (this.connection === null) {
      throw misuse(ErrorClass, 'database is closed');
    }
    return this.connection;
  }

  private runExec(connection: BetterSqlite3.Database, sql: string): void {
    const start = Date.now();
    try {
      connection.exec(sql);
      this.observer.recordQuery(sql, undefined, Date.now() - start, false);
    } catch (error) {
      this.observer.recordQuery(sql, undefined, Date.now() - start, true);
      throw translateError(ExecError, error);
    }
  }

  private counter(query: CounterQuery): bigint {
    const connection = this.live(DatabaseError);
    let statement = this.counters.get(query);
    if (!statement) {
      statement = connection.prepare(query);
      statement.pluck(true);
      statement.safeIntegers(true);
      this.counters.set(query, statement);
    }
    const value: unknown = statement.get();
    return typeof value === 'bigint' ? value : 0n;
  }
}
