import { INT64_MAX, INT64_MIN, type Statement } from '@sqlcell/sqlite';

/** A command-line parameter after type inference. */
export type CliParam =
  | { type: 'integer'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'text'; value: string }
  | { type: 'null' };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Infer a parameter's type from its text: `null` is NULL, integers that fit
 * in 64 bits are INTEGER, other numbers are REAL, the rest is TEXT.
 */
export function parseParam(raw: string): CliParam {
  if (raw === 'null') {
    return { type: 'null' };
  }
  if (INTEGER_PATTERN.test(raw)) {
    const value = BigInt(raw);
    if (value >= INT64_MIN && value <= INT64_MAX) {
      return { type: 'integer', value };
    }
  }
  if (REAL_PATTERN.test(raw)) {
    return { type: 'float', value: Number(raw) };
  }
  return { type: 'text', value: raw };
}

/** Bind parameters positionally, starting at index 1. */
export function bindParams(statement: Statement, params: readonly string[]): void {
  params.forEach((raw, offset) => {
    const index = offset + 1;
    const param = parseParam(raw);
    switch (param.type) {
      case 'integer':
        statement.bindInt64(index, param.value);
        break;
      case 'float':
        statement.bindDouble(index, param.value);
        break;
      case 'text':
        statement.bindText(index, param.value);
        break;
      case 'null':
        statement.bindNull(index);
        break;
    }
  });
}
