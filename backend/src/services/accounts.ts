import type { PoolClient } from 'pg';
import { z } from 'zod';
import { query } from '../db.js';
import { badRequest, conflict, isPgError } from '../errors.js';
import type { Account } from '../models.js';

type AccountRow = {
  id: number;
  user_friendly_name: string | null;
  account_number: string;
  broker_name: string | null;
  created_at: Date;
};

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length ? value : null))
  .nullable()
  .optional();

export const accountInputSchema = z.object({
  userFriendlyName: optionalText,
  accountNumber: z.string().trim().min(1),
  brokerName: optionalText,
});

export const accountPatchSchema = accountInputSchema
  .partial()
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: 'No fields supplied for update',
  });

export type AccountInput = z.input<typeof accountInputSchema>;
export type AccountPatch = z.input<typeof accountPatchSchema>;

const COLUMNS = 'id, user_friendly_name, account_number, broker_name, created_at';

const PATCH_COLUMNS = [
  ['userFriendlyName', 'user_friendly_name'],
  ['accountNumber', 'account_number'],
  ['brokerName', 'broker_name'],
] as const;

function duplicateNumber(error: unknown, accountNumber: string | undefined): unknown {
  if (isPgError(error) && error.code === '23505' && accountNumber !== undefined) {
    return conflict(`account number '${accountNumber}' already exists.`);
  }
  return error;
}

export function mapAccountRow(row: AccountRow): Account {
  return {
    id: row.id,
    userFriendlyName: row.user_friendly_name,
    accountNumber: row.account_number,
    brokerName: row.broker_name,
    createdAt: row.created_at.toISOString(),
  };
}

export async function createAccount(input: AccountInput, client?: PoolClient): Promise<Account> {
  const parsed = accountInputSchema.safeParse(input);
  if (!parsed.success) {
    throw badRequest('invalid account', parsed.error.flatten());
  }
  const body = parsed.data;
  try {
    const { rows } = await query<AccountRow>(
      `insert into accounts (user_friendly_name, account_number, broker_name)
       values ($1, $2, $3)
       returning ${COLUMNS}`,
      [body.userFriendlyName ?? null, body.accountNumber, body.brokerName ?? null],
      client
    );
    return mapAccountRow(rows[0]);
  } catch (error) {
    throw duplicateNumber(error, body.accountNumber);
  }
}

export async function getAccount(id: number, client?: PoolClient): Promise<Account | null> {
  const { rows } = await query<AccountRow>(`select ${COLUMNS} from accounts where id = $1`, [id], client);
  return rows[0] ? mapAccountRow(rows[0]) : null;
}

export async function findAccountByNumber(accountNumber: string): Promise<Account | null> {
  const { rows } = await query<AccountRow>(`select ${COLUMNS} from accounts where account_number = $1`, [
    accountNumber.trim(),
  ]);
  return rows[0] ? mapAccountRow(rows[0]) : null;
}

export async function listAccounts(): Promise<Account[]> {
  const { rows } = await query<AccountRow>(`select ${COLUMNS} from accounts order by id`);
  return rows.map(mapAccountRow);
}

export async function updateAccount(id: number, patch: AccountPatch): Promise<Account | null> {
  const parsed = accountPatchSchema.safeParse(patch);
  if (!parsed.success) {
    throw badRequest('invalid account', parsed.error.flatten());
  }

  const entries = PATCH_COLUMNS.filter(([field]) => parsed.data[field] !== undefined).map(
    ([field, column]) => [column, parsed.data[field] ?? null] as const
  );

  const sets = entries.map(([column], index) => `${column} = $${index + 1}`);
  const values: unknown[] = entries.map(([, value]) => value);
  values.push(id);

  try {
    const { rows } = await query<AccountRow>(
      `update accounts
       set ${sets.join(', ')}
       where id = $${entries.length + 1}
       returning ${COLUMNS}`,
      values
    );
    return rows[0] ? mapAccountRow(rows[0]) : null;
  } catch (error) {
    throw duplicateNumber(error, parsed.data.accountNumber);
  }
}
