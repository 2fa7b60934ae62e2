import { stringify } from 'csv-stringify/sync';

export interface QuickenRecord {
  date: string;
  payee: string;
  fiPayee: string;
  amount: string;
  debitCredit: string;
  category: string;
  account: string;
  tag: string;
  memo: string;
  chknum: string;
}

// Quicken matches columns by header text, and the order is fixed
export const QUICKEN_COLUMNS: ReadonlyArray<{ key: keyof QuickenRecord; header: string }> = [
  { key: 'date', header: 'Date' },
  { key: 'payee', header: 'Payee' },
  { key: 'fiPayee', header: 'FI Payee' },
  { key: 'amount', header: 'Amount' },
  { key: 'debitCredit', header: 'Debit/Credit' },
  { key: 'category', header: 'Category' },
  { key: 'account', header: 'Account' },
  { key: 'tag', header: 'Tag' },
  { key: 'memo', header: 'Memo' },
  { key: 'chknum', header: 'Chknum' },
];

/**
 * Serializes records as a UTF-8 (with BOM) CSV document with CRLF line endings.
 * Fields are only quoted when they contain a comma, a quote or a line break.
 */
export function writeQuickenCsv(records: readonly QuickenRecord[]): string {
  return stringify([...records], {
    header: true,
    columns: QUICKEN_COLUMNS.map(({ key, header }) => ({ key, header })),
    bom: true,
    record_delimiter: 'windows',
    quoted_match: /[\r\n]/,
  });
}
