import { query } from './db.js';
import { ACTION_TYPES, ASSET_TYPES, OPTION_TYPES } from './models.js';

function quoteList(values: readonly string[]): string {
  return values.map((value) => `'${value}'`).join(', ');
}

async function ensureAccountTables(): Promise<void> {
  await query(`
    create table if not exists accounts (
      id serial primary key,
      user_friendly_name text,
      account_number text not null unique,
      broker_name text,
      created_at timestamptz not null default now()
    )
  `);
}

async function ensureImportTables(): Promise<void> {
  await query(`
    create table if not exists import_batches (
      id serial primary key,
      account_id integer not null references accounts(id) on delete cascade,
      broker text not null,
      format_name text not null,
      filename text,
      parsed_count integer not null default 0,
      imported_count integer not null default 0,
      skipped_count integer not null default 0,
      created_at timestamptz not null default now()
    )
  `);

  await query(`create index if not exists idx_import_batches_account on import_batches(account_id, created_at)`);
}

async function ensureTransactionTables(): Promise<void> {
  await query(`
    create table if not exists transactions (
      id serial primary key,
      account_id integer not null references accounts(id) on delete cascade,
      import_batch_id integer references import_batches(id) on delete set null,
      transaction_date date not null,
      ticker text not null,
      asset_type text not null check (asset_type in (${quoteList(ASSET_TYPES)})),
      action text not null check (action in (${quoteList(ACTION_TYPES)})),
      quantity numeric(20,6) not null default 0,
      price numeric(20,6) not null default 0,
      fees numeric(20,6) not null default 0,
      total_amount numeric(20,6) not null default 0,
      notes text,
      option_type text check (option_type in (${quoteList(OPTION_TYPES)})),
      strike_price numeric(20,6),
      expiry_date date,
      created_at timestamptz not null default now()
    )
  `);

  await query(
    `create index if not exists idx_transactions_account_date on transactions(account_id, transaction_date, id)`
  );
  await query(`create index if not exists idx_transactions_ticker on transactions(account_id, ticker)`);
}

/** Creates every table the tracker uses. Safe to run repeatedly. */
export async function ensureSchema(): Promise<void> {
  await ensureAccountTables();
  await ensureImportTables();
  await ensureTransactionTables();
}
