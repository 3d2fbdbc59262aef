/**
 * @sqlcell/sqlite
 *
 * Object-oriented access to SQLite on top of better-sqlite3.
 *
 * - Database owns the connection and creates statements
 * - Statement binds, steps and resets one prepared statement
 * - Column reads one cell of the statement's current row, lazily
 * - Transaction begins on construction and rolls back unless committed
 *
 * One prepared statement handle is shared, reference-counted, between a
 * Statement and every Column drawn from it, and finalized when the last of
 * them lets go.
 */

export { Database, OPEN_READONLY, OPEN_READWRITE, OPEN_CREATE } from './database.js';
export { Statement, type BindValue, type StatementState } from './statement.js';
export { Column, type TextSink } from './column.js';
export { Transaction, withTransaction, type TransactionMode, type TransactionState } from './transaction.js';
export { StatementHandle, StatementRef, type StatementHooks, type WriteResult } from './statement-handle.js';
export { scoped, type ScopedResource } from './scope.js';
export {
  DatabaseError,
  OpenError,
  PrepareError,
  BindError,
  StepError,
  ResetError,
  ExecError,
  ColumnRangeError,
  BeginError,
  CommitError,
  CloseError,
  isDatabaseError,
  translateError,
  misuse,
  type DatabaseErrorClass,
} from './errors.js';
export { RESULT_CODES, resultCodeOf, type ResultCodeName } from './result-codes.js';
export {
  INT64_MIN,
  INT64_MAX,
  formatDouble,
  toSqliteValue,
  asInt,
  asInt64,
  asDouble,
  asText,
  asBlob,
  byteLength,
  type ColumnType,
  type SqliteValue,
} from './value.js';
export { scanParameters, createParameterScanner, type ParameterLayout, type SqlParameter } from './sql/parameters.js';
export { getQueryType, type QueryType, type QueryTypeStats, type StatementStats } from './observer.js';
export {
  parseDatabaseOptions,
  databaseOptionsSchema,
  type DatabaseOptions,
  type ResolvedDatabaseOptions,
  type QueryLogConfig,
} from './config.js';
export { silentLogger, type Logger } from './logger.js';
