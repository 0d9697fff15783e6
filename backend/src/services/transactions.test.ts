import { Decimal } from 'decimal.js';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { importTransactions } from '../importing/services/transaction-import.js';
import type { ParsedTransaction } from '../models.js';
import { fakeDb } from '../testing/fake-db.js';
import { listImportBatches } from './import-batches.js';
import { listTransactions } from './transactions.js';

vi.mock('../db.js', () => import('../testing/fake-db.js'));

function buy(ticker: string, transactionDate: string, sourceRow: number): ParsedTransaction {
  return {
    transactionDate,
    action: 'BUY',
    assetType: 'STOCK',
    ticker,
    quantity: new Decimal(1),
    price: new Decimal(10),
    fees: new Decimal(0),
    totalAmount: new Decimal(-10),
    optionType: null,
    optionStrike: null,
    optionExpiry: null,
    rawDescription: '',
    rawSymbol: ticker,
    sourceRow,
  };
}

let accountId: number;

beforeEach(async () => {
  fakeDb.reset();
  accountId = fakeDb.seedAccount('ACC-1');
  await importTransactions(
    accountId,
    [buy('NVDA', '2025-05-20', 2), buy('AAPL', '2025-05-01', 3), buy('NVDA', '2025-05-10', 4)],
    { broker: 'schwab', formatName: 'transactions_v1', filename: 'may.csv' }
  );
});

describe('listTransactions', () => {
  it('orders transactions by date', async () => {
    const transactions = await listTransactions(accountId);

    expect(transactions.map((tx) => [tx.transactionDate, tx.ticker])).toEqual([
      ['2025-05-01', 'AAPL'],
      ['2025-05-10', 'NVDA'],
      ['2025-05-20', 'NVDA'],
    ]);
    expect(transactions[0].notes).toBeNull();
    expect(transactions[0].quantity.toString()).toBe('1');
  });

  it('filters by date range and ticker', async () => {
    const transactions = await listTransactions(accountId, { from: '2025-05-05', ticker: 'nvda' });

    expect(transactions.map((tx) => tx.transactionDate)).toEqual(['2025-05-10', '2025-05-20']);
    expect(fakeDb.statements.at(-1)).toContain('where account_id = $1 and transaction_date >= $2 and upper(ticker) = $3');
  });

  it('applies the limit', async () => {
    const transactions = await listTransactions(accountId, { to: '2025-05-31', limit: 2 });

    expect(transactions).toHaveLength(2);
  });

  it('rejects malformed dates', async () => {
    await expect(listTransactions(accountId, { from: '05/01/2025' })).rejects.toThrow('expected YYYY-MM-DD');
  });

  it('rejects dates that are not on the calendar', async () => {
    await expect(listTransactions(accountId, { from: '2025-02-30' })).rejects.toThrow('not a calendar date');
    expect(fakeDb.statements.some((sql) => sql.includes('from transactions where'))).toBe(false);
  });
});

describe('listImportBatches', () => {
  it('returns the batches for an account', async () => {
    const batches = await listImportBatches(accountId);

    expect(batches).toEqual([
      {
        id: 1,
        accountId,
        broker: 'schwab',
        formatName: 'transactions_v1',
        filename: 'may.csv',
        parsedCount: 3,
        importedCount: 3,
        skippedCount: 0,
        createdAt: '2025-01-01T00:00:01.000Z',
      },
    ]);
  });
});
