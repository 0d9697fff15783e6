import { withTransaction } from '../../db.js';
import { badRequest, notFound } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { TRADE_ACTIONS, type ParsedTransaction, type Transaction } from '../../models.js';
import { getAccount } from '../../services/accounts.js';
import { recordImportBatch } from '../../services/import-batches.js';
import { insertTransaction } from '../../services/transactions.js';

const logger = createLogger('import');

export type ImportSource = {
  broker: string;
  formatName: string;
  filename?: string | null;
};

export type SkippedTransaction = {
  row: number;
  ticker: string;
  reason: string;
};

export type ImportResult = {
  batchId: number | null;
  created: Transaction[];
  skipped: SkippedTransaction[];
};

const MANUAL_SOURCE: ImportSource = { broker: 'manual', formatName: 'parsed' };

/** Returns why a parsed row cannot be stored, or null when it can. */
export function rejectionReason(transaction: ParsedTransaction): string | null {
  if (
    TRADE_ACTIONS.includes(transaction.action) &&
    transaction.quantity.isZero() &&
    transaction.assetType !== 'CASH'
  ) {
    return `zero quantity for ${transaction.action}`;
  }

  if (transaction.assetType === 'OPTION') {
    const { optionType, optionStrike, optionExpiry } = transaction;
    if (!optionType || !optionStrike || optionStrike.isZero() || !optionExpiry) {
      return 'missing option details';
    }
  }

  return null;
}

/**
 * Stores parsed transactions for an account. Rows failing validation are
 * skipped and reported; the rest are written in a single database
 * transaction together with an import batch record, so a failure leaves
 * nothing behind.
 */
export async function importTransactions(
  accountId: number,
  parsed: ParsedTransaction[],
  source: ImportSource = MANUAL_SOURCE
): Promise<ImportResult> {
  if (!Number.isInteger(accountId) || accountId <= 0) {
    throw badRequest('Account ID must be provided.');
  }

  const account = await getAccount(accountId);
  if (!account) {
    throw notFound(`Account with ID ${accountId} not found.`);
  }

  if (!parsed.length) {
    return { batchId: null, created: [], skipped: [] };
  }

  const accepted: ParsedTransaction[] = [];
  const skipped: SkippedTransaction[] = [];
  for (const transaction of parsed) {
    const reason = rejectionReason(transaction);
    if (reason) {
      skipped.push({ row: transaction.sourceRow, ticker: transaction.ticker, reason });
    } else {
      accepted.push(transaction);
    }
  }

  if (skipped.length) {
    logger.warn(`skipped ${skipped.length} of ${parsed.length} transactions for account ${accountId}`);
  }

  if (!accepted.length) {
    return { batchId: null, created: [], skipped };
  }

  const { batchId, created } = await withTransaction(async (client) => {
    const batch = await recordImportBatch(client, {
      accountId,
      broker: source.broker,
      formatName: source.formatName,
      filename: source.filename ?? null,
      parsedCount: parsed.length,
      importedCount: accepted.length,
      skippedCount: skipped.length,
    });

    const rows: Transaction[] = [];
    for (const transaction of accepted) {
      rows.push(await insertTransaction(client, accountId, batch.id, transaction));
    }
    return { batchId: batch.id, created: rows };
  });

  logger.info(`imported ${created.length} transactions into account ${accountId} (batch ${batchId})`);
  return { batchId, created, skipped };
}
