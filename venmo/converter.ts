import type { ConverterConfig } from './config.js';
import { locateHeader, parsePayload } from './header-locator.js';
import { writeQuickenCsv, type QuickenRecord } from './quicken-writer.js';
import { transformRows, type TransformTally } from './row-transformer.js';
import { createRowBinder } from './venmo-row.js';

export type ConversionSummary = TransformTally & {
  /** Zero-based line index of the Venmo header in the input. */
  headerLine: number;
};

export interface ConversionResult {
  csv: string;
  records: QuickenRecord[];
  summary: ConversionSummary;
}

/**
 * Converts the full text of a Venmo statement export into Quicken CSV.
 * Any malformed transaction aborts the whole conversion.
 */
export function convertVenmoCsv(text: string, config: ConverterConfig): ConversionResult {
  const header = locateHeader(text);
  const rows = parsePayload(header);
  const bind = createRowBinder(header.columns);

  const { records, tally } = transformRows(rows, bind, config);

  return {
    csv: writeQuickenCsv(records),
    records,
    summary: { ...tally, headerLine: header.index },
  };
}
