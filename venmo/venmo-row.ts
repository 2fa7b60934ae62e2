import { MissingColumnError } from './errors.js';

/** One parsed data line, keyed by (corrected) header name. */
export type RawRow = Record<string, string>;

export const REQUIRED_COLUMNS = [
  'ID',
  'Datetime',
  'Type',
  'Status',
  'Note',
  'From',
  'To',
  'Amount (total)',
] as const;

export interface VenmoRow {
  id: string;
  datetime: string;
  type: string;
  status: string;
  note: string;
  from: string;
  to: string;
  amountTotal: string;
  // Older exports leave these out entirely
  amountFee?: string;
  fundingSource?: string;
  destination?: string;
}

export type RowBinder = (raw: RawRow) => VenmoRow;

/**
 * Checks the header once and returns a function that reads each parsed
 * record into a `VenmoRow`. Cells past the end of a short line read as ''.
 */
export function createRowBinder(columns: readonly string[]): RowBinder {
  const present = new Set(columns);
  const missing = REQUIRED_COLUMNS.filter(col => !present.has(col));
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  const optional = (raw: RawRow, col: string): string | undefined =>
    present.has(col) ? (raw[col] ?? '') : undefined;

  return (raw) => ({
    id: raw['ID'] ?? '',
    datetime: raw['Datetime'] ?? '',
    type: raw['Type'] ?? '',
    status: raw['Status'] ?? '',
    note: raw['Note'] ?? '',
    from: raw['From'] ?? '',
    to: raw['To'] ?? '',
    amountTotal: raw['Amount (total)'] ?? '',
    amountFee: optional(raw, 'Amount (fee)'),
    fundingSource: optional(raw, 'Funding Source'),
    destination: optional(raw, 'Destination'),
  });
}
