/**
 * Primary SQLite result codes.
 *
 * better-sqlite3 reports failures by code *name* (often an extended one such
 * as `SQLITE_CONSTRAINT_UNIQUE`); callers of this package get both the name
 * and the numeric primary code.
 */
export const RESULT_CODES = {
  SQLITE_OK: 0,
  SQLITE_ERROR: 1,
  SQLITE_INTERNAL: 2,
  SQLITE_PERM: 3,
  SQLITE_ABORT: 4,
  SQLITE_BUSY: 5,
  SQLITE_LOCKED: 6,
  SQLITE_NOMEM: 7,
  SQLITE_READONLY: 8,
  SQLITE_INTERRUPT: 9,
  SQLITE_IOERR: 10,
  SQLITE_CORRUPT: 11,
  SQLITE_NOTFOUND: 12,
  SQLITE_FULL: 13,
  SQLITE_CANTOPEN: 14,
  SQLITE_PROTOCOL: 15,
  SQLITE_EMPTY: 16,
  SQLITE_SCHEMA: 17,
  SQLITE_TOOBIG: 18,
  SQLITE_CONSTRAINT: 19,
  SQLITE_MISMATCH: 20,
  SQLITE_MISUSE: 21,
  SQLITE_NOLFS: 22,
  SQLITE_AUTH: 23,
  SQLITE_FORMAT: 24,
  SQLITE_RANGE: 25,
  SQLITE_NOTADB: 26,
  SQLITE_NOTICE: 27,
  SQLITE_WARNING: 28,
  SQLITE_ROW: 100,
  SQLITE_DONE: 101,
} as const;

export type ResultCodeName = keyof typeof RESULT_CODES;

function isResultCodeName(name: string): name is ResultCodeName {
  return Object.prototype.hasOwnProperty.call(RESULT_CODES, name);
}

/**
 * Numeric primary code for a code name. Extended names resolve to their
 * primary code by dropping the trailing `_SUFFIX`; unknown names are
 * `SQLITE_ERROR`.
 */
export function resultCodeOf(name: string): number {
  if (isResultCodeName(name)) return RESULT_CODES[name];

  const primary = name.split('_').slice(0, 2).join('_');
  if (isResultCodeName(primary)) return RESULT_CODES[primary];

  return RESULT_CODES.SQLITE_ERROR;
}
