import type BetterSqlite3 from 'better-sqlite3';
import { DatabaseError, PrepareError, misuse, translateError } from './errors.js';
import { scanParameters, type ParameterLayout } from './sql/parameters.js';

/**
 * Lifecycle and query notifications a handle sends to its connection.
 */
export interface StatementHooks {
  recordPrepare(sql: string): void;
  recordFinalize(sql: string): void;
  recordQuery(
    text: string,
    params: readonly unknown[] | undefined,
    durationMs: number,
    isError: boolean,
  ): void;
}

export interface WriteResult {
  changes: number;
  lastInsertRowid: bigint;
}

/**
 * One prepared statement shared by a Statement and every Column drawn from
 * it, together with the cursor of its current execution.
 *
 * The handle is never used directly: holders get a `StatementRef`, and the
 * handle is finalized when the last ref is released. The connection is only
 * observed, never closed, by the handle.
 */
export class StatementHandle {
  private raw: BetterSqlite3.Statement | null;
  private cursor: IterableIterator<unknown> | null = null;
  private row: readonly unknown[] | undefined;
  private references = 0;
  private errorMessage: string | null = null;

  private constructor(
    raw: BetterSqlite3.Statement,
    readonly sql: string,
    readonly reader: boolean,
    readonly columnNames: readonly string[],
    readonly parameters: ParameterLayout,
    private readonly hooks: StatementHooks,
  ) {
    this.raw = raw;
  }

  /**
   * Prepare `sql` on `connection` and return the first holder.
   *
   * @throws PrepareError on malformed SQL or when the engine rejects it
   */
  static acquire(connection: BetterSqlite3.Database, sql: string, hooks: StatementHooks): StatementRef {
    const parameters = scanParameters(sql);

    let raw: BetterSqlite3.Statement;
    let columnNames: string[] = [];
    try {
      raw = connection.prepare(sql);
      raw.safeIntegers(true);
      if (raw.reader) {
        raw.raw(true);
        columnNames = raw.columns().map((column) => column.name);
      }
    } catch (error) {
      // Nothing has been counted yet; the unreferenced raw statement goes with the connection.
      throw translateError(PrepareError, error);
    }

    const handle = new StatementHandle(raw, sql, raw.reader, columnNames, parameters, hooks);
    hooks.recordPrepare(sql);
    return handle.retain();
  }

  get referenceCount(): number {
    return this.references;
  }

  get finalized(): boolean {
    return this.raw === null;
  }

  get cursorOpen(): boolean {
    return this.cursor !== null;
  }

  get currentRow(): readonly unknown[] | undefined {
    return this.row;
  }

  /** Message of the latest engine failure on this handle, `'not an error'` when the latest call succeeded. */
  get lastErrorMessage(): string {
    return this.errorMessage ?? 'not an error';
  }

  /** Remember the outcome of the latest call: a failure message, or null on success. */
  noteOutcome(errorMessage: string | null): void {
    this.errorMessage = errorMessage;
  }

  /** Raw value at `index` in the current row; NULL when there is no row. */
  cell(index: number): unknown {
    const value = this.row?.[index];
    return value === undefined ? null : value;
  }

  /** @internal Add a holder. */
  retain(): StatementRef {
    this.rawStatement();
    this.references++;
    return new StatementRef(this);
  }

  /** @internal Drop a holder; the last one finalizes. */
  drop(): void {
    this.references--;
    if (this.references === 0) {
      this.finalize();
    }
  }

  /** Run a reader with `args` and move to its first row. */
  start(args: readonly unknown[]): boolean {
    this.closeCursor();
    this.cursor = this.rawStatement().iterate(...args);
    return this.advance();
  }

  /** Move the open cursor to its next row. */
  advance(): boolean {
    const cursor = this.cursor;
    if (cursor === null) {
      this.row = undefined;
      return false;
    }

    let next: IteratorResult<unknown>;
    try {
      next = cursor.next();
    } catch (error) {
      this.closeCursor();
      throw error;
    }

    if (next.done) {
      this.cursor = null;
      this.row = undefined;
      return false;
    }

    this.row = Array.isArray(next.value) ? next.value : [];
    return true;
  }

  /** Run a statement that returns no data. */
  run(args: readonly unknown[]): WriteResult {
    this.closeCursor();
    const result = this.rawStatement().run(...args);
    return {
      changes: result.changes,
      lastInsertRowid: BigInt(result.lastInsertRowid),
    };
  }

  closeCursor(): void {
    const cursor = this.cursor;
    this.cursor = null;
    this.row = undefined;
    cursor?.return?.();
  }

  recordQuery(params: readonly unknown[], durationMs: number, isError: boolean): void {
    this.hooks.recordQuery(this.sql, params, durationMs, isError);
  }

  private rawStatement(): BetterSqlite3.Statement {
    if (this.raw === null) {
      throw misuse(DatabaseError, 'statement handle has been finalized');
    }
    return this.raw;
  }

  private finalize(): void {
    this.closeCursor();
    this.raw = null;
    this.hooks.recordFinalize(this.sql);
  }
}

/**
 * One holder of a shared `StatementHandle`.
 *
 * `copy()` adds a holder; `release()` drops this one, at most once.
 */
export class StatementRef {
  private released = false;

  constructor(private readonly target: StatementHandle) {}

  get isReleased(): boolean {
    return this.released;
  }

  get handle(): StatementHandle {
    if (this.released) {
      throw misuse(DatabaseError, 'statement reference has been released');
    }
    return this.target;
  }

  copy(): StatementRef {
    return this.handle.retain();
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.target.drop();
  }
}
