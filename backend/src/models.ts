import type { Decimal } from 'decimal.js';

export const ACTION_TYPES = [
  'BUY',
  'SELL',
  'SELL_TO_OPEN',
  'BUY_TO_OPEN',
  'SELL_TO_CLOSE',
  'BUY_TO_CLOSE',
  'DIVIDEND',
  'INTEREST',
  'FEE',
] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export const ASSET_TYPES = ['STOCK', 'OPTION', 'CASH'] as const;
export type AssetType = (typeof ASSET_TYPES)[number];

export const OPTION_TYPES = ['CALL', 'PUT'] as const;
export type OptionType = (typeof OPTION_TYPES)[number];

export const OPTION_ACTIONS: readonly ActionType[] = ['SELL_TO_OPEN', 'BUY_TO_OPEN', 'SELL_TO_CLOSE', 'BUY_TO_CLOSE'];

export const TRADE_ACTIONS: readonly ActionType[] = ['BUY', 'SELL', ...OPTION_ACTIONS];

export type Account = {
  id: number;
  userFriendlyName: string | null;
  accountNumber: string;
  brokerName: string | null;
  createdAt: string;
};

export type Transaction = {
  id: number;
  accountId: number;
  importBatchId: number | null;
  transactionDate: string;
  ticker: string;
  assetType: AssetType;
  action: ActionType;
  quantity: Decimal;
  price: Decimal;
  fees: Decimal;
  totalAmount: Decimal;
  notes: string | null;
  optionType: OptionType | null;
  strikePrice: Decimal | null;
  expiryDate: string | null;
  createdAt: string;
};

export type ImportBatch = {
  id: number;
  accountId: number;
  broker: string;
  formatName: string;
  filename: string | null;
  parsedCount: number;
  importedCount: number;
  skippedCount: number;
  createdAt: string;
};

/** One broker row, normalized but not yet tied to an account. */
export type ParsedTransaction = {
  transactionDate: string;
  action: ActionType;
  assetType: AssetType;
  ticker: string;
  quantity: Decimal;
  price: Decimal;
  fees: Decimal;
  totalAmount: Decimal;
  optionType: OptionType | null;
  optionStrike: Decimal | null;
  optionExpiry: string | null;
  rawDescription: string;
  rawSymbol: string;
  sourceRow: number;
};

export function describeAccount(account: Account): string {
  const label = account.userFriendlyName ? ` (${account.userFriendlyName})` : '';
  return `#${account.id} ${account.accountNumber}${label}`;
}
