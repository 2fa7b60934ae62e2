import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

import { EmptyPayloadError, HeaderNotFoundError } from './errors.js';
import { REQUIRED_COLUMNS, type RawRow } from './venmo-row.js';

// The header is recognised by its leading columns, in this order
export const HEADER_PREFIX = REQUIRED_COLUMNS;

export const PLACEHOLDER_PREFIX = 'Ignore';

export interface LocatedHeader {
  /** Zero-based line index of the header within the input. */
  index: number;
  /** Header cells with blank ones renamed to `Ignore<n>`. */
  columns: string[];
  /** The corrected header, re-serialized as a CSV line. */
  line: string;
  /** Corrected header line followed by every line after it. */
  payload: string;
}

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(
    (record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'),
  );
}

function isRawRowList(value: unknown): value is RawRow[] {
  return Array.isArray(value) && value.every(
    (record) =>
      typeof record === 'object' &&
      record !== null &&
      Object.values(record).every((cell) => typeof cell === 'string'),
  );
}

function splitCells(line: string): string[] | null {
  let records: unknown;
  try {
    records = parse(line, { relax_column_count: true });
  } catch {
    // Lines that aren't well-formed CSV can't be the header
    return null;
  }
  if (!isStringMatrix(records) || records.length !== 1) {
    return null;
  }
  return records[0];
}

function matchesHeader(cells: string[]): boolean {
  const trimmed = cells.map(cell => cell.trim());
  const offset = trimmed[0] === '' ? 1 : 0;
  return HEADER_PREFIX.every((name, i) => trimmed[offset + i] === name);
}

export function placeholderName(columnIndex: number): string {
  return `${PLACEHOLDER_PREFIX}${columnIndex + 1}`;
}

function stripBom(text: string): string {
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

/**
 * Finds the first line that looks like the Venmo transaction header and
 * renames its blank cells so the CSV parser keeps every column.
 * Everything after the header line is passed on untouched, so line breaks
 * inside quoted fields keep their original form.
 */
export function locateHeader(text: string): LocatedHeader {
  const body = stripBom(text);
  // Lines at even indices, their terminators at odd ones
  const parts = body.split(/(\r?\n)/);
  let offset = 0;

  for (let p = 0; p < parts.length; p += 2) {
    const current = parts[p];
    const lineEnd = offset + current.length;
    const cells = splitCells(current);

    if (cells && matchesHeader(cells)) {
      const columns = cells.map((cell, col) => (cell.trim() === '' ? placeholderName(col) : cell.trim()));
      const line = stringify([columns], { eof: false });

      return {
        index: p / 2,
        columns,
        line,
        payload: line + body.slice(lineEnd),
      };
    }
    offset = lineEnd + (parts[p + 1] ?? '').length;
  }

  throw new HeaderNotFoundError();
}

export function parsePayload(header: LocatedHeader): RawRow[] {
  const records: unknown = parse(header.payload, {
    columns: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    record_delimiter: ['\r\n', '\n'],
  });

  if (!isRawRowList(records)) {
    throw new TypeError('CSV parser returned an unexpected record shape');
  }
  if (records.length === 0) {
    throw new EmptyPayloadError();
  }
  return records;
}
