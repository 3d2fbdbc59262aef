import type { StatementRef } from './statement-handle.js';
import {
  asBlob,
  asDouble,
  asInt,
  asInt64,
  asText,
  byteLength,
  toSqliteValue,
  type ColumnType,
  type SqliteValue,
} from './value.js';

/** Anything text can be written to: a Writable, process.stdout, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * One cell of the current row of a Statement.
 *
 * A Column holds its own reference to the statement handle plus an index, and
 * reads the handle's *current* row every time a getter is called. Once the
 * statement has stepped past the row the column was drawn from, the column
 * reads the new row; once the statement is done or reset, it reads as NULL.
 *
 * Type tests (`isInteger()` and friends) report the stored type. Test them
 * before relying on a converting getter, as the engine only defines the type
 * of an unconverted cell.
 */
export class Column {
  constructor(
    private readonly ref: StatementRef,
    private readonly index: number,
  ) {}

  getIndex(): number {
    return this.index;
  }

  getName(): string {
    return this.ref.handle.columnNames[this.index] ?? '';
  }

  getValue(): SqliteValue {
    return toSqliteValue(this.ref.handle.cell(this.index));
  }

  getType(): ColumnType {
    return this.getValue().type;
  }

  isInteger(): boolean {
    return this.getType() === 'integer';
  }

  isFloat(): boolean {
    return this.getType() === 'float';
  }

  isText(): boolean {
    return this.getType() === 'text';
  }

  isBlob(): boolean {
    return this.getType() === 'blob';
  }

  isNull(): boolean {
    return this.getType() === 'null';
  }

  getInt(): number {
    return asInt(this.getValue());
  }

  getInt64(): bigint {
    return asInt64(this.getValue());
  }

  getDouble(): number {
    return asDouble(this.getValue());
  }

  getText(): string {
    return asText(this.getValue());
  }

  getBlob(): Buffer {
    return asBlob(this.getValue());
  }

  /**
   * Size in bytes of the text or blob value, of the text form of a number,
   * or 0 for NULL.
   */
  getBytes(): number {
    return byteLength(this.getValue());
  }

  /** Engine message of the statement's latest failure, `'not an error'` when there is none. */
  getErrorMessage(): string {
    return this.ref.handle.lastErrorMessage;
  }

  /** Share the statement handle with a new Column at the same index. */
  copy(): Column {
    return new Column(this.ref.copy(), this.index);
  }

  release(): void {
    this.ref.release();
  }

  get isReleased(): boolean {
    return this.ref.isReleased;
  }

  writeTo(sink: TextSink): void {
    sink.write(this.getText());
  }

  toString(): string {
    return this.getText();
  }
}
