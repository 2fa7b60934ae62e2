import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { defaultOutputPath, run } from './venmo-to-quicken.js';
import {
  DINNER,
  ENDING_BALANCE,
  EXPECTED_HEADER,
  EXPECTED_ROWS,
  PREAMBLE,
  RENT,
  TRANSFER,
  VENMO_HEADER_LINE,
  statement,
} from './__fixtures__/statement.js';

describe('defaultOutputPath', () => {
  it('puts the output beside the input', () => {
    expect(defaultOutputPath(join('exports', 'May.csv'))).toBe(join('exports', 'May_for_Quicken.csv'));
  });
});

describe('run', () => {
  let dir: string;
  let input: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'venmo-to-quicken-'));
    input = join(dir, 'statement.csv');
    writeFileSync(input, statement([...PREAMBLE, VENMO_HEADER_LINE, DINNER, RENT, TRANSFER, ENDING_BALANCE]));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the converted file beside the input and reports counts', () => {
    expect(run([input], {})).toBe(0);

    const output = join(dir, 'statement_for_Quicken.csv');
    expect(readFileSync(output, 'utf8')).toBe(EXPECTED_HEADER + EXPECTED_ROWS.join(''));
    expect(console.log).toHaveBeenCalledWith('✅ Converted 3 transactions');
    expect(console.log).toHaveBeenCalledWith('⏭️ Skipped 1 balance lines');
    expect(console.log).toHaveBeenCalledWith(`📄 Output saved to: ${output}`);
  });

  it('writes a UTF-8 byte-order mark', () => {
    run([input], {});

    const bytes = readFileSync(join(dir, 'statement_for_Quicken.csv'));
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
  });

  it('honours output, account and date format flags', () => {
    const output = join(dir, 'custom.csv');

    expect(run(['-o', output, '--account', 'Venmo (Joint)', '-f', 'yyyy-MM-dd', input], {})).toBe(0);

    const lines = readFileSync(output, 'utf8').split('\r\n');
    expect(lines[1]).toBe(
      '2023-05-01,Alice,,-12.50,,,Venmo (Joint),,Note: Dinner | Type: Payment | Status: Complete | From: Test User | To: Alice | Funding Source: Venmo balance,',
    );
    expect(existsSync(join(dir, 'statement_for_Quicken.csv'))).toBe(false);
  });

  it('takes the account from the environment', () => {
    run([input], { VENMO_QUICKEN_ACCOUNT: 'Shared' });

    const lines = readFileSync(join(dir, 'statement_for_Quicken.csv'), 'utf8').split('\r\n');
    expect(lines[1].split(',')[6]).toBe('Shared');
  });

  it('fails before processing when the input does not exist', () => {
    const missing = join(dir, 'missing.csv');

    expect(run([missing], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`❌ Error: Input file ${missing} not found`);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('fails on an invalid date format without writing anything', () => {
    expect(run(['-f', 'YYYY', input], {})).toBe(1);
    expect(existsSync(join(dir, 'statement_for_Quicken.csv'))).toBe(false);
  });

  it('reports conversion errors', () => {
    writeFileSync(input, statement(PREAMBLE));

    expect(run([input], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^❌ Error: Could not find the Venmo transaction header/));
  });

  it('requires an input path', () => {
    expect(run([], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith('❌ Error: Input file is required.');
  });

  it('prints help', () => {
    expect(run(['--help'], {})).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
  });
});
