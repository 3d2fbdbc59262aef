import chalk from 'chalk';
import { asText, formatDouble, type SqliteValue } from '@sqlcell/sqlite';

export type JsonCell = string | number | null;

export interface QueryResult {
  columns: string[];
  rows: SqliteValue[][];
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Integers beyond the safe range are rendered as strings; blobs as `x'..'` hex literals. */
export function toJsonCell(value: SqliteValue): JsonCell {
  switch (value.type) {
    case 'integer':
      return value.value >= MIN_SAFE && value.value <= MAX_SAFE ? Number(value.value) : value.value.toString();
    case 'float':
      return Number.isFinite(value.value) ? value.value : formatDouble(value.value);
    case 'text':
      return value.value;
    case 'blob':
      return `x'${value.value.toString('hex')}'`;
    case 'null':
      return null;
  }
}

export function rowsToJson(result: QueryResult): Record<string, JsonCell>[] {
  return result.rows.map((row) => {
    const record: Record<string, JsonCell> = {};
    result.columns.forEach((name, index) => {
      record[name] = toJsonCell(row[index]);
    });
    return record;
  });
}

function plainCell(value: SqliteValue): string {
  switch (value.type) {
    case 'null':
      return 'NULL';
    case 'blob':
      return `x'${value.value.toString('hex')}'`;
    default:
      return asText(value);
  }
}

/**
 * Render rows as an aligned table followed by a row count.
 */
export function formatTable(result: QueryResult): string[] {
  const { columns, rows } = result;
  const lines: string[] = [];
  const cellRows = rows.map((row) => row.map(plainCell));

  if (columns.length > 0) {
    const widths = columns.map((name, index) =>
      Math.max(name.length, ...cellRows.map((cells) => cells[index].length)),
    );

    const render = (cells: string[], values?: SqliteValue[]): string =>
      cells
        .map((cell, index) => {
          const padded = cell.padEnd(widths[index]);
          return values?.[index].type === 'null' ? chalk.gray(padded) : padded;
        })
        .join(' | ')
        .trimEnd();

    lines.push(chalk.bold(render(columns)));
    lines.push(widths.map((width) => '-'.repeat(width)).join('-+-'));
    cellRows.forEach((cells, index) => {
      lines.push(render(cells, rows[index]));
    });
  }

  lines.push(chalk.gray(`(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})`));
  return lines;
}
