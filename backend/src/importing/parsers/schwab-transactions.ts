import { parse } from 'csv-parse/sync';
import { Decimal } from 'decimal.js';
import { UnreadableCsvError, errorMessage } from '../../errors.js';
import {
  OPTION_ACTIONS,
  type ActionType,
  type AssetType,
  type OptionType,
  type ParsedTransaction,
} from '../../models.js';
import { parseBrokerDecimal, parseUsDate } from './values.js';

export type ParseIssue = {
  row: number;
  message: string;
};

export type ParseResult = {
  transactions: ParsedTransaction[];
  issues: ParseIssue[];
};

const ACTION_MAP: ReadonlyMap<string, ActionType> = new Map<string, ActionType>([
  ['Buy', 'BUY'],
  ['Sell', 'SELL'],
  ['Sell to Open', 'SELL_TO_OPEN'],
  ['Buy to Open', 'BUY_TO_OPEN'],
  ['Sell to Close', 'SELL_TO_CLOSE'],
  ['Buy to Close', 'BUY_TO_CLOSE'],
  ['Qualified Dividend', 'DIVIDEND'],
  ['Cash Dividend', 'DIVIDEND'],
  ['Interest Income', 'INTEREST'],
]);

// Cash movements that never become transactions; skipped without an issue.
const IGNORED_ACTIONS = new Set([
  'moneylink transfer',
  'journal',
  'service fee',
  'funds received',
  'funds paid',
  'dividend paid',
  'adjustment',
  'bank interest',
  'atm withdrawal',
  'bill pay',
  'check paid',
  'client requested electronic funding receipt (pull)',
  'client requested electronic funding disbursement (push)',
  'dividend reinvestment',
  'funds transfer',
  'tax payment',
  'wire transfer incoming',
  'wire transfer outgoing',
]);

/** `MSFT 12/18/2026 400.00 P` */
const OPTION_SYMBOL_PATTERN = /^([A-Z]+)\s+(\d{1,2}\/\d{1,2}\/\d{2,4})\s+([\d.]+)\s+([CP])/;

/** `PUT MICROSOFT CORP $400 EXP 12/18/26` */
const OPTION_DESCRIPTION_PATTERN = /(CALL|PUT)\s+([A-Z\s.]+?)\s+\$(\d+(?:\.\d+)?)\s+EXP\s+(\d{1,2}\/\d{1,2}\/\d{2,4})/;

type OptionDetails = {
  ticker: string;
  optionType: OptionType;
  strike: Decimal;
  expiry: string;
};

type RowOutcome =
  | { kind: 'parsed'; transaction: ParsedTransaction }
  | { kind: 'ignored' }
  | { kind: 'issue'; message: string };

// Throws when the symbol is an option symbol with an impossible expiry.
function optionFromSymbol(symbol: string): OptionDetails | null {
  const match = symbol.match(OPTION_SYMBOL_PATTERN);
  if (!match) return null;
  const [, ticker, expiryText, strikeText, typeChar] = match;
  const expiry = parseUsDate(expiryText, { allowTwoDigitYear: true });
  if (!expiry) {
    throw new Error(`invalid option expiry '${expiryText}' in symbol '${symbol}'`);
  }
  return {
    ticker,
    optionType: typeChar === 'C' ? 'CALL' : 'PUT',
    strike: new Decimal(strikeText),
    expiry,
  };
}

function optionFromDescription(description: string, symbol: string): OptionDetails | null {
  const match = description.toUpperCase().match(OPTION_DESCRIPTION_PATTERN);
  if (!match) return null;
  const [, typeText, underlyingName, strikeText, expiryText] = match;
  const expiry = parseUsDate(expiryText, { allowTwoDigitYear: true });
  if (!expiry) return null;

  const symbolIsTicker = symbol !== '' && !OPTION_SYMBOL_PATTERN.test(symbol) && !symbol.includes(' ');
  const ticker = symbolIsTicker ? symbol : underlyingName.trim().split(' ')[0];

  return {
    ticker,
    optionType: typeText === 'CALL' ? 'CALL' : 'PUT',
    strike: new Decimal(strikeText),
    expiry,
  };
}

function parseRow(fields: Record<string, string>, row: number): RowOutcome {
  const rawAction = (fields['Action'] ?? '').trim();
  if (!rawAction) {
    return { kind: 'ignored' };
  }

  const action = ACTION_MAP.get(rawAction);
  if (!action) {
    if (IGNORED_ACTIONS.has(rawAction.toLowerCase())) {
      return { kind: 'ignored' };
    }
    return { kind: 'issue', message: `unmapped action '${rawAction}'` };
  }

  const dateText = (fields['Date'] ?? '').trim();
  if (!dateText) {
    return { kind: 'ignored' };
  }
  const transactionDate = parseUsDate(dateText);
  if (!transactionDate) {
    return { kind: 'issue', message: `invalid date '${dateText}'` };
  }

  const symbol = (fields['Symbol'] ?? '').trim();
  const description = (fields['Description'] ?? '').trim();

  let assetType: AssetType = 'STOCK';
  let ticker = symbol;
  let option: OptionDetails | null = null;

  if (OPTION_ACTIONS.includes(action)) {
    assetType = 'OPTION';
    option = (symbol ? optionFromSymbol(symbol) : null) ?? (description ? optionFromDescription(description, symbol) : null);
    if (!option) {
      return {
        kind: 'issue',
        message: `option action '${rawAction}' for '${symbol}' - '${description}' without readable option details`,
      };
    }
    ticker = option.ticker;
  } else if (action === 'DIVIDEND' || action === 'INTEREST') {
    assetType = 'CASH';
    ticker = symbol || description;
  }

  return {
    kind: 'parsed',
    transaction: {
      transactionDate,
      action,
      assetType,
      ticker: ticker.trim(),
      quantity: parseBrokerDecimal(fields['Quantity']).abs(),
      price: parseBrokerDecimal(fields['Price']).abs(),
      fees: parseBrokerDecimal(fields['Fees & Comm']).abs(),
      totalAmount: parseBrokerDecimal(fields['Amount']),
      optionType: option?.optionType ?? null,
      optionStrike: option?.strike ?? null,
      optionExpiry: option?.expiry ?? null,
      rawDescription: description,
      rawSymbol: symbol,
      sourceRow: row,
    },
  };
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((field) => typeof field === 'string'))
  );
}

function readRows(csvContent: string): string[][] {
  const cleaned = csvContent.replace(/\u0000/g, '').replace(/^\uFEFF/, '');
  if (!cleaned.trim()) return [];
  let rows: unknown;
  try {
    rows = parse(cleaned, {
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new UnreadableCsvError(errorMessage(error));
  }
  if (!isStringRows(rows)) {
    throw new Error('unexpected CSV parser output');
  }
  return rows;
}

/**
 * Parses a Schwab "Transactions" CSV export. Rows that are not trades,
 * dividends or interest are dropped; rows that look like trades but cannot
 * be read are reported in `issues`. A file that is not valid CSV throws
 * `UnreadableCsvError`.
 *
 * Row numbers count the header as row 1 and ignore blank lines.
 */
export function parseSchwabTransactions(csvContent: string): ParseResult {
  const [header, ...dataRows] = readRows(csvContent);
  const result: ParseResult = { transactions: [], issues: [] };
  if (!header) return result;

  const columns = header.map((name) => name.trim());

  dataRows.forEach((values, index) => {
    const row = index + 2;
    const fields: Record<string, string> = {};
    columns.forEach((column, position) => {
      fields[column] = values[position] ?? '';
    });

    try {
      const outcome = parseRow(fields, row);
      if (outcome.kind === 'parsed') {
        result.transactions.push(outcome.transaction);
      } else if (outcome.kind === 'issue') {
        result.issues.push({ row, message: outcome.message });
      }
    } catch (error) {
      result.issues.push({ row, message: error instanceof Error ? error.message : String(error) });
    }
  });

  return result;
}
