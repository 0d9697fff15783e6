import type { PoolClient } from 'pg';
import { query } from '../db.js';
import type { ImportBatch } from '../models.js';

type ImportBatchRow = {
  id: number;
  account_id: number;
  broker: string;
  format_name: string;
  filename: string | null;
  parsed_count: number;
  imported_count: number;
  skipped_count: number;
  created_at: Date;
};

export type ImportBatchInput = {
  accountId: number;
  broker: string;
  formatName: string;
  filename: string | null;
  parsedCount: number;
  importedCount: number;
  skippedCount: number;
};

const COLUMNS = 'id, account_id, broker, format_name, filename, parsed_count, imported_count, skipped_count, created_at';

function mapImportBatchRow(row: ImportBatchRow): ImportBatch {
  return {
    id: row.id,
    accountId: row.account_id,
    broker: row.broker,
    formatName: row.format_name,
    filename: row.filename,
    parsedCount: row.parsed_count,
    importedCount: row.imported_count,
    skippedCount: row.skipped_count,
    createdAt: row.created_at.toISOString(),
  };
}

export async function recordImportBatch(client: PoolClient, input: ImportBatchInput): Promise<ImportBatch> {
  const { rows } = await query<ImportBatchRow>(
    `insert into import_batches (account_id, broker, format_name, filename, parsed_count, imported_count, skipped_count)
     values ($1, $2, $3, $4, $5, $6, $7)
     returning ${COLUMNS}`,
    [
      input.accountId,
      input.broker,
      input.formatName,
      input.filename,
      input.parsedCount,
      input.importedCount,
      input.skippedCount,
    ],
    client
  );
  return mapImportBatchRow(rows[0]);
}

export async function listImportBatches(accountId: number): Promise<ImportBatch[]> {
  const { rows } = await query<ImportBatchRow>(
    `select ${COLUMNS} from import_batches where account_id = $1 order by created_at desc, id desc`,
    [accountId]
  );
  return rows.map(mapImportBatchRow);
}
