import { Decimal } from 'decimal.js';
import { format, isValid, parse, parseISO } from 'date-fns';

import type { ConverterConfig } from './config.js';
import { AmountParseError, DateParseError, MissingFieldError } from './errors.js';
import { PLACEHOLDER_PREFIX } from './header-locator.js';
import type { QuickenRecord } from './quicken-writer.js';
import type { RawRow, RowBinder, VenmoRow } from './venmo-row.js';

export type RowDecision = 'discard-silent' | 'discard-balance' | 'proceed';

export interface RowStats {
  nonEmptyCount: number;
  ignorePopulatedCount: number;
  /** Column name of the only populated cell, when there is exactly one. */
  soleField: string | null;
  hasDatetime: boolean;
}

export interface ClassificationRule {
  name: string;
  matches: (stats: RowStats) => boolean;
  decision: Exclude<RowDecision, 'proceed'>;
}

// First match wins. Both balance checks have to run before the Datetime
// check, since balance lines may or may not carry a Datetime.
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'blank-line',
    matches: s => s.nonEmptyCount === 0,
    decision: 'discard-silent',
  },
  {
    name: 'placeholder-balance',
    matches: s => s.nonEmptyCount === 1 && s.ignorePopulatedCount === 1,
    decision: 'discard-balance',
  },
  {
    name: 'amount-only-balance',
    matches: s => s.nonEmptyCount === 1 && s.soleField === 'Amount (total)',
    decision: 'discard-balance',
  },
  {
    name: 'no-datetime',
    matches: s => !s.hasDatetime,
    decision: 'discard-silent',
  },
];

export function rowStats(raw: RawRow): RowStats {
  const populated = Object.entries(raw).filter(([, value]) => value.trim() !== '');
  return {
    nonEmptyCount: populated.length,
    ignorePopulatedCount: populated.filter(([column]) => column.startsWith(PLACEHOLDER_PREFIX)).length,
    soleField: populated.length === 1 ? populated[0][0] : null,
    hasDatetime: (raw['Datetime'] ?? '').trim() !== '',
  };
}

export function classifyRow(raw: RawRow): { decision: RowDecision; rule: string | null } {
  const stats = rowStats(raw);
  const rule = CLASSIFICATION_RULES.find(r => r.matches(stats));
  return rule ? { decision: rule.decision, rule: rule.name } : { decision: 'proceed', rule: null };
}

// parseISO also takes bare years and centuries, so it only sees full date-times
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

const DATE_PATTERNS = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd',
  'MM/dd/yyyy HH:mm:ss',
  'MM/dd/yyyy h:mm:ss a',
  'MM/dd/yyyy',
  'M/d/yyyy',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseDatetime(value: string, row: number): Date {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new MissingFieldError('Datetime', row);
  }

  if (ISO_DATETIME.test(trimmed)) {
    const iso = parseISO(trimmed);
    if (isValid(iso)) return iso;
  }

  for (const pattern of DATE_PATTERNS) {
    const parsed = parse(trimmed, pattern, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  throw new DateParseError(value, row);
}

const DECIMAL_PATTERN = /^(\d+\.?\d*|\.\d+)$/;

/**
 * Parses Venmo amounts such as "- $1,234.50" or "+ $20.00", rounded to cents.
 * The sign comes from a leading "-"; everything else that isn't part of
 * the number is stripped first.
 */
export function parseAmount(value: string, row: number): Decimal {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new MissingFieldError('Amount (total)', row);
  }

  const negative = trimmed.startsWith('-');
  const cleaned = trimmed.replace(/[+\-\s,\p{Sc}]/gu, '');
  if (!DECIMAL_PATTERN.test(cleaned)) {
    throw new AmountParseError(value, row);
  }

  const magnitude = new Decimal(cleaned).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
  return negative && !magnitude.isZero() ? magnitude.negated() : magnitude;
}

export function formatAmount(amount: Decimal): string {
  return amount.toFixed(2, Decimal.ROUND_HALF_UP);
}

export function inferPayee(row: VenmoRow, amount: Decimal): string {
  if (amount.isNegative() && row.to) return row.to;
  if (!amount.isNegative() && row.from) return row.from;
  return row.from || row.to || row.note || 'Venmo';
}

export function composeMemo(row: VenmoRow): string {
  const fragments: Array<[string, string | undefined]> = [
    ['Note', row.note],
    ['Type', row.type],
    ['Status', row.status],
    ['From', row.from],
    ['To', row.to],
    ['Amount (fee)', row.amountFee],
    ['Funding Source', row.fundingSource],
    ['Destination', row.destination],
  ];
  return fragments
    .filter((entry): entry is [string, string] => !!entry[1])
    .map(([label, value]) => `${label}: ${value}`)
    .join(' | ');
}

export function toQuickenRecord(row: VenmoRow, rowNumber: number, config: ConverterConfig): QuickenRecord {
  const date = parseDatetime(row.datetime, rowNumber);
  const amount = parseAmount(row.amountTotal, rowNumber);

  return {
    date: format(date, config.dateFormat),
    payee: inferPayee(row, amount),
    fiPayee: '',
    amount: formatAmount(amount),
    debitCredit: '',
    category: '',
    account: config.account,
    tag: '',
    memo: composeMemo(row),
    chknum: '',
  };
}

export interface TransformTally {
  written: number;
  skippedBalances: number;
  discarded: number;
  parsed: number;
}

export interface TransformResult {
  records: QuickenRecord[];
  tally: TransformTally;
}

/**
 * Runs every parsed row through classification and, for the rows that
 * survive it, field derivation. Records keep their input order.
 */
export function transformRows(rows: readonly RawRow[], bind: RowBinder, config: ConverterConfig): TransformResult {
  const result: TransformResult = {
    records: [],
    tally: { written: 0, skippedBalances: 0, discarded: 0, parsed: rows.length },
  };

  rows.forEach((raw, i) => {
    const { decision } = classifyRow(raw);
    switch (decision) {
      case 'discard-silent':
        result.tally.discarded++;
        return;
      case 'discard-balance':
        result.tally.skippedBalances++;
        return;
      case 'proceed':
        result.records.push(toQuickenRecord(bind(raw), i + 1, config));
        result.tally.written++;
        return;
    }
  });

  return result;
}
