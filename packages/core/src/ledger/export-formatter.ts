/**
 * Export Formatter
 *
 * Renders receipts as an RFC 4180 CSV document and reads such documents back
 * into raw receipt fields for bulk import.
 */

import { MalformedTabularError } from './ledger-errors.js';
import type { LedgerSnapshot, Receipt } from './ledger-types.js';

export const TABULAR_COLUMNS = ['id', 'date', 'category', 'description', 'amount'] as const;

const DELIMITER = ',';
const QUOTE = '"';
const LINE_BREAK = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

/** Map a receipt to its row cells in column order */
export function toTabularRow(receipt: Receipt): string[] {
  return [
    String(receipt.id),
    receipt.date,
    receipt.category,
    receipt.description,
    String(receipt.amount),
  ];
}

/**
 * Quote a cell when it holds the delimiter, a quote or a line break
 */
export function escapeCell(cell: string): string {
  if (!NEEDS_QUOTING.test(cell)) {
    return cell;
  }
  return `${QUOTE}${cell.replaceAll(QUOTE, QUOTE + QUOTE)}${QUOTE}`;
}

/**
 * Render a snapshot as CSV: a header row, then one row per receipt in
 * snapshot order. Every row, including the last, ends with CRLF.
 */
export function toTabular(snapshot: LedgerSnapshot): string {
  const lines = [
    TABULAR_COLUMNS.join(DELIMITER),
    ...snapshot.map((receipt) => toTabularRow(receipt).map(escapeCell).join(DELIMITER)),
  ];
  return lines.map((line) => line + LINE_BREAK).join('');
}

/**
 * Split a CSV document into rows of cells.
 * Accepts CRLF or LF line endings and quoted cells spanning lines.
 *
 * @throws {MalformedTabularError} If a quoted cell is never closed
 */
export function parseRows(document: string): string[][] {
  const text = document.startsWith('\uFEFF') ? document.slice(1) : document;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let index = 0;

  const endRow = () => {
    row.push(cell);
    // A lone empty cell is a blank line
    if (row.length > 1 || row[0] !== '') {
      rows.push(row);
    }
    row = [];
    cell = '';
  };

  while (index < text.length) {
    const char = text[index];

    if (inQuotes) {
      if (char === QUOTE) {
        if (text[index + 1] === QUOTE) {
          cell += QUOTE;
          index += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += char;
      }
      index += 1;
      continue;
    }

    if (char === QUOTE && cell === '') {
      inQuotes = true;
    } else if (char === DELIMITER) {
      row.push(cell);
      cell = '';
    } else if (char === '\r' && text[index + 1] === '\n') {
      endRow();
      index += 1;
    } else if (char === '\n' || char === '\r') {
      endRow();
    } else {
      cell += char;
    }
    index += 1;
  }

  if (inQuotes) {
    throw new MalformedTabularError('unterminated quoted field');
  }
  if (cell !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Parse a CSV document with a header row into header-keyed records.
 * Missing trailing cells become absent keys; extra cells are ignored.
 */
export function parseTabular(document: string): Record<string, string>[] {
  const [header, ...body] = parseRows(document);
  if (!header) {
    return [];
  }

  const columns = header.map((name) => name.trim());

  return body.map((cells) => {
    const record: Record<string, string> = {};
    columns.forEach((column, position) => {
      const value = cells[position];
      if (column && value !== undefined) {
        record[column] = value;
      }
    });
    return record;
  });
}
