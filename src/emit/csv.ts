/**
 * Delimited Text Codec
 *
 * Output tables are comma-separated with a header row, `\n` line endings and
 * RFC 4180 quoting. Missing values are empty cells. A non-finite number is a
 * defect upstream and is refused rather than written.
 */

import { NumericPolicyError } from '../core/errors.js';

/**
 * A single table cell before encoding; undefined means missing
 */
export type CellValue = string | number | undefined;

/**
 * A flat relation
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
}

export const MISSING_CELL = '';
export const DEFAULT_DELIMITER = ',';

function quoteIfNeeded(text: string, delimiter: string): string {
  if (text.includes(delimiter) || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Encode one cell
 *
 * @throws NumericPolicyError when the value is NaN or infinite
 */
export function formatCell(column: string, value: CellValue, delimiter: string = DEFAULT_DELIMITER): string {
  if (value === undefined) {
    return MISSING_CELL;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new NumericPolicyError(column, value);
    }
    return Object.is(value, -0) ? '0' : String(value);
  }

  return quoteIfNeeded(value, delimiter);
}

/**
 * Encode a table, header first, with a trailing newline
 */
export function encodeTable(table: Table, delimiter: string = DEFAULT_DELIMITER): string {
  const lines = [table.columns.map((column) => quoteIfNeeded(column, delimiter)).join(delimiter)];

  for (const row of table.rows) {
    if (row.length !== table.columns.length) {
      throw new Error(`Row has ${row.length} cells but the table has ${table.columns.length} columns`);
    }
    lines.push(
      row.map((value, i) => formatCell(table.columns[i] ?? `#${i}`, value, delimiter)).join(delimiter)
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Split delimited text into rows of raw cells
 *
 * Handles quoted cells, doubled quotes and CRLF line endings. Blank lines are
 * dropped.
 */
export function parseDelimited(text: string, delimiter: string = DEFAULT_DELIMITER): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;

  const endRow = (): void => {
    row.push(cell);
    if (row.length > 1 || row[0] !== '') {
      rows.push(row);
    }
    row = [];
    cell = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      row.push(cell);
      cell = '';
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else {
      cell += char;
    }
  }

  if (cell !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Rows of a parsed table keyed by header name
 */
export interface HeaderedRows {
  readonly columns: readonly string[];
  readonly records: readonly ReadonlyMap<string, string>[];
}

/**
 * Parse delimited text whose first row is a header
 */
export function parseHeaderedTable(text: string, delimiter: string = DEFAULT_DELIMITER): HeaderedRows {
  const [header, ...body] = parseDelimited(text, delimiter);
  if (!header) {
    return { columns: [], records: [] };
  }

  const columns = header.map((name) => name.trim());
  const records = body.map((cells) => {
    const record = new Map<string, string>();
    columns.forEach((name, i) => record.set(name, (cells[i] ?? '').trim()));
    return record;
  });

  return { columns, records };
}

/**
 * Read a numeric cell; undefined when absent, empty or not a finite number
 */
export function numericCell(record: ReadonlyMap<string, string>, column: string): number | undefined {
  const raw = record.get(column);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
