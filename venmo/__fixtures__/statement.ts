import { stringify } from 'csv-stringify/sync';

import { placeholderName } from '../header-locator.js';

// Column layout of a recent statement export: one unlabeled leading
// column and two unlabeled trailing ones.
export const VENMO_COLUMNS = [
  '',
  'ID',
  'Datetime',
  'Type',
  'Status',
  'Note',
  'From',
  'To',
  'Amount (total)',
  'Amount (fee)',
  'Funding Source',
  'Destination',
  '',
  '',
];

export const VENMO_HEADER_LINE = stringify([VENMO_COLUMNS], { eof: false });

/** Builds one statement line; keys are column names or `IgnoreN` for unlabeled columns. */
export function venmoLine(fields: Record<string, string>): string {
  const cells = VENMO_COLUMNS.map((name, i) => fields[name || placeholderName(i)] ?? '');
  return stringify([cells], { eof: false });
}

export const PREAMBLE = [
  'Account Statement - (@test-user),,,',
  'Account Activity,,,',
];

export const DINNER = venmoLine({
  ID: '1001',
  Datetime: '2023-05-01T10:15:00',
  Type: 'Payment',
  Status: 'Complete',
  Note: 'Dinner',
  From: 'Test User',
  To: 'Alice',
  'Amount (total)': '- $12.50',
  'Funding Source': 'Venmo balance',
});

export const RENT = venmoLine({
  ID: '1002',
  Datetime: '2023-05-02T09:00:00',
  Type: 'Payment',
  Status: 'Complete',
  Note: 'Rent, May',
  From: 'Bob',
  To: 'Test User',
  'Amount (total)': '+ $1,234.50',
  Destination: 'Venmo balance',
});

export const TRANSFER = venmoLine({
  ID: '1003',
  Datetime: '2023-05-03T18:30:00',
  Type: 'Standard Transfer',
  Status: 'Issued',
  'Amount (total)': '- $50.00',
  'Amount (fee)': '- $0.25',
  Destination: 'Test Bank *1234',
});

export const ENDING_BALANCE = venmoLine({ Ignore13: '$95.00' });

export const EXPECTED_HEADER = '\uFEFFDate,Payee,FI Payee,Amount,Debit/Credit,Category,Account,Tag,Memo,Chknum\r\n';

export const EXPECTED_ROWS = [
  '05/01/2023,Alice,,-12.50,,,Venmo,,Note: Dinner | Type: Payment | Status: Complete | From: Test User | To: Alice | Funding Source: Venmo balance,\r\n',
  '05/02/2023,Bob,,1234.50,,,Venmo,,"Note: Rent, May | Type: Payment | Status: Complete | From: Bob | To: Test User | Destination: Venmo balance",\r\n',
  '05/03/2023,Venmo,,-50.00,,,Venmo,,Type: Standard Transfer | Status: Issued | Amount (fee): - $0.25 | Destination: Test Bank *1234,\r\n',
];

export function statement(lines: string[]): string {
  return lines.join('\n') + '\n';
}
