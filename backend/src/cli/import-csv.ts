import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { HttpError, errorMessage } from '../errors.js';
import { getParser, type ParseResult } from '../importing/parsers/index.js';
import { importTransactions } from '../importing/services/transaction-import.js';
import type { ParsedTransaction } from '../models.js';

const USAGE =
  'usage: import-csv --account_id ID --broker schwab --format_name transactions_v1 --filepath FILE [--dry-run]';

const argsSchema = z.object({
  account_id: z.coerce.number().int().positive(),
  broker: z.string().trim().min(1),
  format_name: z.string().trim().min(1),
  filepath: z.string().min(1),
  'dry-run': z.boolean().default(false),
});

type ImportArgs = z.infer<typeof argsSchema>;

function readArgs(argv: string[]): ImportArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      account_id: { type: 'string' },
      broker: { type: 'string' },
      format_name: { type: 'string' },
      filepath: { type: 'string' },
      'dry-run': { type: 'boolean' },
    },
  });
  const parsed = argsSchema.safeParse(values);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new Error(problems.join('; '));
  }
  return parsed.data;
}

async function readCsv(filepath: string): Promise<string> {
  try {
    return await readFile(filepath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`File not found at ${filepath}`);
    }
    throw new Error(`Error reading file: ${errorMessage(error)}`);
  }
}

function describeParsed(transaction: ParsedTransaction): string {
  const parts = [
    transaction.transactionDate,
    transaction.action,
    transaction.ticker,
    `qty=${transaction.quantity.toString()}`,
    `price=${transaction.price.toString()}`,
    `fees=${transaction.fees.toString()}`,
    `amount=${transaction.totalAmount.toString()}`,
  ];
  if (transaction.optionType && transaction.optionStrike && transaction.optionExpiry) {
    parts.push(`${transaction.optionType} ${transaction.optionStrike.toString()} exp ${transaction.optionExpiry}`);
  }
  return parts.join(' ');
}

export async function runImportCsv(argv: string[]): Promise<number> {
  let args: ImportArgs;
  try {
    args = readArgs(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}\n${USAGE}`);
    return 1;
  }

  console.log(`Attempting to import file: ${args.filepath} for account ID: ${args.account_id}`);

  let parsed: ParseResult;
  try {
    const parse = getParser(args.broker, args.format_name);
    parsed = parse(await readCsv(args.filepath));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  const { transactions, issues } = parsed;
  for (const issue of issues) {
    console.warn(`Skipping row ${issue.row}: ${issue.message}`);
  }
  console.log(`Parser returned ${transactions.length} potential transactions.`);

  if (!transactions.length) {
    console.log('No transactions were parsed from the file.');
    return 0;
  }

  if (args['dry-run']) {
    transactions.forEach((transaction, index) => {
      console.log(`Item ${index + 1}: ${describeParsed(transaction)}`);
    });
    return 0;
  }

  try {
    const result = await importTransactions(args.account_id, transactions, {
      broker: args.broker.toLowerCase(),
      formatName: args.format_name.toLowerCase(),
      filename: args.filepath,
    });
    for (const skipped of result.skipped) {
      console.warn(`Skipped row ${skipped.row} (${skipped.ticker}): ${skipped.reason}`);
    }
    if (result.created.length) {
      console.log(`Successfully imported ${result.created.length} transactions into account ${args.account_id}.`);
    } else {
      console.log('No new transactions were imported. Every parsed row failed validation.');
    }
    return 0;
  } catch (error) {
    if (error instanceof HttpError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error(`An error occurred during the import process: ${errorMessage(error)}`);
    }
    return 1;
  }
}
