import { resultCodeOf } from './result-codes.js';

/**
 * Failure reported by the engine or detected by the wrapper.
 *
 * `code` is the numeric primary result code, `codeName` the name the engine
 * reported (possibly an extended one).
 */
export class DatabaseError extends Error {
  readonly code: number;
  readonly codeName: string;

  constructor(message: string, codeName = 'SQLITE_ERROR', options?: ErrorOptions) {
    super(message, options);
    this.name = 'DatabaseError';
    this.codeName = codeName;
    this.code = resultCodeOf(codeName);
  }
}

export class OpenError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'OpenError';
  }
}

export class PrepareError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'PrepareError';
  }
}

export class BindError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'BindError';
  }
}

export class StepError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'StepError';
  }
}

export class ResetError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'ResetError';
  }
}

export class ExecError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'ExecError';
  }
}

/** Column index or name outside the statement's declared result columns. */
export class ColumnRangeError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'ColumnRangeError';
  }
}

export class BeginError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'BeginError';
  }
}

export class CommitError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'CommitError';
  }
}

export class CloseError extends DatabaseError {
  constructor(message: string, codeName?: string, options?: ErrorOptions) {
    super(message, codeName, options);
    this.name = 'CloseError';
  }
}

export type DatabaseErrorClass<E extends DatabaseError> = new (
  message: string,
  codeName?: string,
  options?: ErrorOptions,
) => E;

export function isDatabaseError(error: unknown): error is DatabaseError {
  return error instanceof DatabaseError;
}

function engineCodeName(error: Error): string {
  if ('code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_')) {
    return error.code;
  }
  // The binding layer raises plain TypeErrors/RangeErrors for misuse.
  if (/\bbusy\b/i.test(error.message)) return 'SQLITE_BUSY';
  if (error instanceof RangeError) return 'SQLITE_RANGE';
  if (error instanceof TypeError) return 'SQLITE_MISUSE';
  return 'SQLITE_ERROR';
}

/**
 * Convert anything thrown by the engine into `ErrorClass`.
 *
 * All engine failures in this package go through here.
 */
export function translateError<E extends DatabaseError>(
  ErrorClass: DatabaseErrorClass<E>,
  cause: unknown,
): E {
  if (cause instanceof ErrorClass) return cause;

  if (cause instanceof DatabaseError) {
    return new ErrorClass(cause.message, cause.codeName, { cause });
  }

  if (cause instanceof Error) {
    return new ErrorClass(cause.message, engineCodeName(cause), { cause });
  }

  return new ErrorClass(String(cause), 'SQLITE_ERROR', { cause });
}

/** Programming error detected by the wrapper itself. */
export function misuse<E extends DatabaseError>(ErrorClass: DatabaseErrorClass<E>, message: string): E {
  return new ErrorClass(message, 'SQLITE_MISUSE');
}
