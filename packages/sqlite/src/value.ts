/**
 * Dynamic SQLite values and the engine's coercion rules between them.
 *
 * Rows are read with better-sqlite3's safe-integer mode, so INTEGER cells
 * arrive as bigint and REAL cells as number.
 */

export type ColumnType = 'integer' | 'float' | 'text' | 'blob' | 'null';

export type SqliteValue =
  | { type: 'integer'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'text'; value: string }
  | { type: 'blob'; value: Buffer }
  | { type: 'null'; value: null };

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const LEADING_INTEGER = /^\s*([+-]?\d+)/;
const LEADING_REAL = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;

/** Classify a raw cell as returned by the engine. Anything unknown reads as NULL. */
export function toSqliteValue(cell: unknown): SqliteValue {
  if (typeof cell === 'bigint') return { type: 'integer', value: cell };
  if (typeof cell === 'number') return { type: 'float', value: cell };
  if (typeof cell === 'string') return { type: 'text', value: cell };
  if (Buffer.isBuffer(cell)) return { type: 'blob', value: cell };
  if (cell instanceof Uint8Array) {
    return { type: 'blob', value: Buffer.from(cell.buffer, cell.byteOffset, cell.byteLength) };
  }
  return { type: 'null', value: null };
}

function clampInt64(value: bigint): bigint {
  if (value < INT64_MIN) return INT64_MIN;
  if (value > INT64_MAX) return INT64_MAX;
  return value;
}

function doubleToInt64(value: number): bigint {
  if (Number.isNaN(value)) return 0n;
  if (value <= -9.223372036854775808e18) return INT64_MIN;
  if (value >= 9.223372036854775807e18) return INT64_MAX;
  return BigInt(Math.trunc(value));
}

function textToInt64(text: string): bigint {
  const match = LEADING_INTEGER.exec(text);
  return match ? clampInt64(BigInt(match[1])) : 0n;
}

function textToDouble(text: string): number {
  const match = LEADING_REAL.exec(text);
  return match ? Number(match[0]) : 0;
}

/**
 * Render a REAL the way the engine does (`%!.15g`): 15 significant digits,
 * exponent form outside [1e-4, 1e15), and always a decimal point.
 */
export function formatDouble(value: number): string {
  if (value === Infinity) return 'Inf';
  if (value === -Infinity) return '-Inf';
  if (Number.isNaN(value)) return '';

  const sign = value < 0 ? '-' : '';
  const magnitude = Math.abs(value);
  const [mantissa, exponentText] = magnitude.toExponential(14).split('e');
  const exponent = Number(exponentText);

  const trim = (digits: string): string => {
    if (!digits.includes('.')) return `${digits}.0`;
    const trimmed = digits.replace(/0+$/, '');
    return trimmed.endsWith('.') ? `${trimmed}0` : trimmed;
  };

  if (exponent < -4 || exponent >= 15) {
    const exp = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${trim(mantissa)}e${exponent < 0 ? '-' : '+'}${exp}`;
  }

  return `${sign}${trim(magnitude.toFixed(14 - exponent))}`;
}

export function asInt64(value: SqliteValue): bigint {
  switch (value.type) {
    case 'integer':
      return value.value;
    case 'float':
      return doubleToInt64(value.value);
    case 'text':
      return textToInt64(value.value);
    case 'blob':
      return textToInt64(value.value.toString('utf8'));
    case 'null':
      return 0n;
  }
}

/** 32-bit view of the 64-bit value, truncated like a C cast. */
export function asInt(value: SqliteValue): number {
  return Number(BigInt.asIntN(32, asInt64(value)));
}

export function asDouble(value: SqliteValue): number {
  switch (value.type) {
    case 'integer':
      return Number(value.value);
    case 'float':
      return value.value;
    case 'text':
      return textToDouble(value.value);
    case 'blob':
      return textToDouble(value.value.toString('utf8'));
    case 'null':
      return 0;
  }
}

export function asText(value: SqliteValue): string {
  switch (value.type) {
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatDouble(value.value);
    case 'text':
      return value.value;
    case 'blob':
      return value.value.toString('utf8');
    case 'null':
      return '';
  }
}

/** Returns a copy; mutating it never touches the row. */
export function asBlob(value: SqliteValue): Buffer {
  switch (value.type) {
    case 'blob':
      return Buffer.from(value.value);
    case 'null':
      return Buffer.alloc(0);
    default:
      return Buffer.from(asText(value), 'utf8');
  }
}

export function byteLength(value: SqliteValue): number {
  switch (value.type) {
    case 'blob':
      return value.value.length;
    case 'null':
      return 0;
    default:
      return Buffer.byteLength(asText(value), 'utf8');
  }
}
