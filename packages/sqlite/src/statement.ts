import { Column } from './column.js';
import type { Database } from './database.js';
import {
  BindError,
  ColumnRangeError,
  DatabaseError,
  ExecError,
  ResetError,
  StepError,
  misuse,
  translateError,
  type DatabaseErrorClass,
} from './errors.js';
import type { StatementHandle, StatementRef } from './statement-handle.js';
import { INT64_MAX, INT64_MIN, toSqliteValue } from './value.js';

export type BindValue = number | bigint | string | Buffer | Uint8Array | null;

/** What the engine is actually handed for a parameter. */
type BoundValue = bigint | number | string | Buffer | null;

export type StatementState = 'unexecuted' | 'row' | 'done';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * A prepared SQL statement.
 *
 * Lifecycle: `unexecuted` → `executeStep()` → `row` (repeat) → `done`;
 * `reset()` returns to `unexecuted` and keeps the bindings. Parameters can
 * only be bound while `unexecuted`.
 *
 * The statement owns one reference to its handle; every Column it hands out
 * owns another. `close()` drops the statement's own reference.
 */
export class Statement {
  private readonly ref: StatementRef;
  private bindings: BoundValue[];
  private state: StatementState = 'unexecuted';
  private changes = 0;

  constructor(db: Database, sql: string) {
    this.ref = db.acquireStatementHandle(sql);
    this.bindings = new Array<BoundValue>(this.ref.handle.parameters.count).fill(null);
  }

  getQuery(): string {
    return this.ref.handle.sql;
  }

  getState(): StatementState {
    return this.state;
  }

  hasRow(): boolean {
    return this.state === 'row';
  }

  isDone(): boolean {
    return this.state === 'done';
  }

  isClosed(): boolean {
    return this.ref.isReleased;
  }

  getColumnCount(): number {
    return this.live(ColumnRangeError).columnNames.length;
  }

  getColumnName(index: number): string {
    const handle = this.live(ColumnRangeError);
    return handle.columnNames[this.columnIndex(handle, index)];
  }

  getParameterCount(): number {
    return this.live(BindError).parameters.count;
  }

  /** 1-based index of a named parameter (with its prefix), or 0 when unknown. */
  getParameterIndex(name: string): number {
    return this.live(BindError).parameters.indexByName.get(name) ?? 0;
  }

  /** Rows changed by the last write this statement executed. */
  getChanges(): number {
    return this.changes;
  }

  /**
   * Bind a value to a 1-based index or a prefixed name (`:id`, `@id`, `$id`).
   *
   * Safe integers bind as INTEGER, other numbers as REAL.
   */
  bind(parameter: number | string, value: BindValue): this {
    this.setBinding(parameter, normalizeBindValue(value));
    return this;
  }

  bindInt(parameter: number | string, value: number): this {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new BindError(`not a 32-bit integer: ${value}`, 'SQLITE_MISMATCH');
    }
    this.setBinding(parameter, BigInt(value));
    return this;
  }

  bindInt64(parameter: number | string, value: bigint | number): this {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new BindError(`not a safe integer: ${value}`, 'SQLITE_MISMATCH');
    }
    this.setBinding(parameter, normalizeBindValue(BigInt(value)));
    return this;
  }

  bindDouble(parameter: number | string, value: number): this {
    this.setBinding(parameter, value);
    return this;
  }

  bindText(parameter: number | string, value: string): this {
    this.setBinding(parameter, value);
    return this;
  }

  bindBlob(parameter: number | string, value: Buffer | Uint8Array): this {
    this.setBinding(parameter, normalizeBindValue(value));
    return this;
  }

  bindNull(parameter: number | string): this {
    this.setBinding(parameter, null);
    return this;
  }

  /** Set every parameter back to NULL. */
  clearBindings(): this {
    if (this.state !== 'unexecuted') {
      throw misuse(BindError, 'cannot clear bindings of an executing statement; call reset() first');
    }
    this.bindings.fill(null);
    return this;
  }

  /**
   * Advance to the next row.
   *
   * @returns true when a row is available, false when the statement is done
   * @throws StepError on engine failure, or when stepping a finished statement
   */
  executeStep(): boolean {
    const handle = this.live(StepError);
    if (this.state === 'done') {
      throw misuse(StepError, 'statement is done; call reset() before stepping again');
    }

    if (!handle.reader) {
      this.runWrite(handle, StepError);
      return false;
    }

    if (this.state === 'row') {
      try {
        const hasRow = handle.advance();
        handle.noteOutcome(null);
        return this.settle(hasRow);
      } catch (error) {
        this.state = 'done';
        throw this.failed(handle, translateError(StepError, error));
      }
    }

    const args = this.bindArguments(handle);
    const start = Date.now();
    try {
      const hasRow = handle.start(args);
      handle.recordQuery(args, Date.now() - start, false);
      handle.noteOutcome(null);
      return this.settle(hasRow);
    } catch (error) {
      handle.recordQuery(args, Date.now() - start, true);
      this.state = 'done';
      throw this.failed(handle, translateError(StepError, error));
    }
  }

  /**
   * Execute a statement that returns no rows.
   *
   * @returns number of rows changed
   * @throws ExecError on engine failure or when the statement returns rows
   */
  exec(): number {
    const handle = this.live(ExecError);
    if (this.state !== 'unexecuted') {
      throw misuse(ExecError, 'statement already executed; call reset() first');
    }
    if (handle.reader) {
      throw misuse(ExecError, 'exec() does not expect results; use executeStep()');
    }
    return this.runWrite(handle, ExecError);
  }

  /** Back to the unexecuted state; bindings are kept. */
  reset(): this {
    const handle = this.live(ResetError);
    try {
      handle.closeCursor();
    } catch (error) {
      throw translateError(ResetError, error);
    }
    this.state = 'unexecuted';
    return this;
  }

  /**
   * A Column sharing this statement's handle.
   *
   * @throws ColumnRangeError when the index is outside the declared result
   *   columns or the name is not one of them
   */
  getColumn(column: number | string): Column {
    const handle = this.live(ColumnRangeError);
    const index = this.columnIndex(handle, column);
    return new Column(this.ref.copy(), index);
  }

  /** Engine message of the latest failed step or execution, `'not an error'` otherwise. */
  getErrorMessage(): string {
    return this.live(DatabaseError).lastErrorMessage;
  }

  /** NULL test on the current row without handing out a Column. */
  isColumnNull(column: number | string): boolean {
    const handle = this.live(ColumnRangeError);
    return toSqliteValue(handle.cell(this.columnIndex(handle, column))).type === 'null';
  }

  /**
   * Drop the statement's reference. The handle is finalized once every
   * Column drawn from it is released too.
   */
  close(): void {
    this.ref.release();
  }

  private live<E extends DatabaseError>(ErrorClass: DatabaseErrorClass<E>): StatementHandle {
    if (this.ref.isReleased) {
      throw misuse(ErrorClass, 'statement is closed');
    }
    return this.ref.handle;
  }

  private failed<E extends DatabaseError>(handle: StatementHandle, error: E): E {
    handle.noteOutcome(error.message);
    return error;
  }

  private settle(hasRow: boolean): boolean {
    this.state = hasRow ? 'row' : 'done';
    return hasRow;
  }

  private runWrite<E extends DatabaseError>(
    handle: StatementHandle,
    ErrorClass: DatabaseErrorClass<E>,
  ): number {
    const args = this.bindArguments(handle);
    const start = Date.now();
    try {
      this.changes = handle.run(args).changes;
      handle.recordQuery(args, Date.now() - start, false);
      handle.noteOutcome(null);
    } catch (error) {
      handle.recordQuery(args, Date.now() - start, true);
      throw this.failed(handle, translateError(ErrorClass, error));
    } finally {
      this.state = 'done';
    }
    return this.changes;
  }

  private columnIndex(handle: StatementHandle, column: number | string): number {
    const count = handle.columnNames.length;
    if (typeof column === 'string') {
      const index = handle.columnNames.indexOf(column);
      if (index === -1) {
        throw new ColumnRangeError(`no column named ${column}`, 'SQLITE_RANGE');
      }
      return index;
    }
    if (!Number.isInteger(column) || column < 0 || column >= count) {
      throw new ColumnRangeError(`column index ${column} out of range (0..${count - 1})`, 'SQLITE_RANGE');
    }
    return column;
  }

  private setBinding(parameter: number | string, value: BoundValue): void {
    const handle = this.live(BindError);
    if (this.state !== 'unexecuted') {
      throw misuse(BindError, 'cannot bind to an executing statement; call reset() first');
    }

    const { count, indexByName } = handle.parameters;
    const index = typeof parameter === 'number' ? parameter : indexByName.get(parameter);
    if (index === undefined) {
      throw new BindError(`unknown parameter name: ${parameter}`, 'SQLITE_RANGE');
    }
    if (!Number.isInteger(index) || index < 1 || index > count) {
      throw new BindError(`bind index ${index} out of range (1..${count})`, 'SQLITE_RANGE');
    }
    this.bindings[index - 1] = value;
  }

  /** Anonymous parameters positionally, named ones as a single object. */
  private bindArguments(handle: StatementHandle): unknown[] {
    const positional: unknown[] = [];
    const named: Record<string, BoundValue> = {};
    for (const parameter of handle.parameters.parameters) {
      const value = this.bindings[parameter.index - 1];
      if (parameter.name === null) {
        positional.push(value);
      } else {
        named[parameter.name.slice(1)] = value;
      }
    }
    return handle.parameters.indexByName.size > 0 ? [...positional, named] : positional;
  }
}

function normalizeBindValue(value: BindValue): BoundValue {
  if (value === null || typeof value === 'string' || Buffer.isBuffer(value)) {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? BigInt(value) : value;
  }
  if (typeof value === 'bigint') {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new BindError(`integer does not fit in 64 bits: ${value}`, 'SQLITE_MISMATCH');
    }
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  throw new BindError(`cannot bind a value of type ${typeof value}`, 'SQLITE_MISMATCH');
}
