import type { PoolClient } from 'pg';
import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { query } from '../db.js';
import { isCalendarDate } from '../importing/parsers/values.js';
import type { ActionType, AssetType, OptionType, ParsedTransaction, Transaction } from '../models.js';

type TransactionRow = {
  id: number;
  account_id: number;
  import_batch_id: number | null;
  transaction_date: string;
  ticker: string;
  asset_type: AssetType;
  action: ActionType;
  quantity: string;
  price: string;
  fees: string;
  total_amount: string;
  notes: string | null;
  option_type: OptionType | null;
  strike_price: string | null;
  expiry_date: string | null;
  created_at: Date;
};

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => {
    const [year, month, day] = value.split('-').map(Number);
    return isCalendarDate(year, month, day);
  }, 'not a calendar date');

export const transactionFilterSchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  ticker: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase())
    .optional(),
  limit: z.coerce.number().int().min(1).max(5000).default(500),
});

export type TransactionFilter = z.input<typeof transactionFilterSchema>;

const COLUMNS = `id, account_id, import_batch_id, transaction_date, ticker, asset_type, action,
  quantity, price, fees, total_amount, notes, option_type, strike_price, expiry_date, created_at`;

export function mapTransactionRow(row: TransactionRow): Transaction {
  return {
    id: row.id,
    accountId: row.account_id,
    importBatchId: row.import_batch_id,
    transactionDate: row.transaction_date,
    ticker: row.ticker,
    assetType: row.asset_type,
    action: row.action,
    quantity: new Decimal(row.quantity),
    price: new Decimal(row.price),
    fees: new Decimal(row.fees),
    totalAmount: new Decimal(row.total_amount),
    notes: row.notes,
    optionType: row.option_type,
    strikePrice: row.strike_price == null ? null : new Decimal(row.strike_price),
    expiryDate: row.expiry_date,
    createdAt: row.created_at.toISOString(),
  };
}

export async function insertTransaction(
  client: PoolClient,
  accountId: number,
  importBatchId: number | null,
  parsed: ParsedTransaction
): Promise<Transaction> {
  const { rows } = await query<TransactionRow>(
    `insert into transactions (
       account_id, import_batch_id, transaction_date, ticker, asset_type, action,
       quantity, price, fees, total_amount, notes, option_type, strike_price, expiry_date
     )
     values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
     returning ${COLUMNS}`,
    [
      accountId,
      importBatchId,
      parsed.transactionDate,
      parsed.ticker,
      parsed.assetType,
      parsed.action,
      parsed.quantity.toString(),
      parsed.price.toString(),
      parsed.fees.toString(),
      parsed.totalAmount.toString(),
      parsed.rawDescription || null,
      parsed.optionType,
      parsed.optionStrike ? parsed.optionStrike.toString() : null,
      parsed.optionExpiry,
    ],
    client
  );
  return mapTransactionRow(rows[0]);
}

export async function listTransactions(accountId: number, filter: TransactionFilter = {}): Promise<Transaction[]> {
  const { from, to, ticker, limit } = transactionFilterSchema.parse(filter);

  const clauses = ['account_id = $1'];
  const params: unknown[] = [accountId];

  if (from) {
    params.push(from);
    clauses.push(`transaction_date >= $${params.length}`);
  }
  if (to) {
    params.push(to);
    clauses.push(`transaction_date <= $${params.length}`);
  }
  if (ticker) {
    params.push(ticker);
    clauses.push(`upper(ticker) = $${params.length}`);
  }

  params.push(limit);
  const { rows } = await query<TransactionRow>(
    `select ${COLUMNS}
     from transactions
     where ${clauses.join(' and ')}
     order by transaction_date asc, id asc
     limit $${params.length}`,
    params
  );
  return rows.map(mapTransactionRow);
}
