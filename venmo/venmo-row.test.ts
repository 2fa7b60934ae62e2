import { describe, expect, it } from 'vitest';

import { MissingColumnError } from './errors.js';
import { createRowBinder, REQUIRED_COLUMNS } from './venmo-row.js';

describe('createRowBinder', () => {
  it('reports every missing required column', () => {
    const columns = ['ID', 'Datetime', 'Type', 'Status', 'Note', 'From'];

    expect(() => createRowBinder(columns)).toThrow(MissingColumnError);
    expect(() => createRowBinder(columns)).toThrow('Missing required columns: To, Amount (total)');
  });

  it('binds named fields and leaves absent optional columns undefined', () => {
    const bind = createRowBinder([...REQUIRED_COLUMNS, 'Destination']);
    const row = bind({
      ID: '42',
      Datetime: '2023-05-01T10:15:00',
      Type: 'Payment',
      Status: 'Complete',
      Note: 'Coffee',
      From: 'Test User',
      To: 'Alice',
      'Amount (total)': '- $4.00',
      Destination: '',
    });

    expect(row).toEqual({
      id: '42',
      datetime: '2023-05-01T10:15:00',
      type: 'Payment',
      status: 'Complete',
      note: 'Coffee',
      from: 'Test User',
      to: 'Alice',
      amountTotal: '- $4.00',
      amountFee: undefined,
      fundingSource: undefined,
      destination: '',
    });
  });

  it('reads cells missing from a short line as empty', () => {
    const bind = createRowBinder([...REQUIRED_COLUMNS, 'Amount (fee)']);
    const row = bind({ ID: '1', Datetime: '2023-05-01' });

    expect(row.note).toBe('');
    expect(row.amountTotal).toBe('');
    expect(row.amountFee).toBe('');
  });
});
