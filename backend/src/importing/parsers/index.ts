import { ImportFormatError } from '../../errors.js';
import { parseSchwabTransactions, type ParseResult } from './schwab-transactions.js';

export type { ParseIssue, ParseResult } from './schwab-transactions.js';

export type TransactionParser = (csvContent: string) => ParseResult;

export type ImportFormat = {
  broker: string;
  formatName: string;
  description: string;
};

type RegisteredFormat = ImportFormat & { parse: TransactionParser };

const FORMATS: RegisteredFormat[] = [
  {
    broker: 'schwab',
    formatName: 'transactions_v1',
    description: 'Charles Schwab brokerage "Transactions" CSV export',
    parse: parseSchwabTransactions,
  },
];

export function listImportFormats(): ImportFormat[] {
  return FORMATS.map(({ broker, formatName, description }) => ({ broker, formatName, description }));
}

export function supportedBrokers(): string[] {
  return [...new Set(FORMATS.map((format) => format.broker))];
}

export function supportedFormats(broker: string): string[] {
  const normalized = broker.trim().toLowerCase();
  return FORMATS.filter((format) => format.broker === normalized).map((format) => format.formatName);
}

export function getParser(broker: string, formatName: string): TransactionParser {
  const normalizedBroker = broker.trim().toLowerCase();
  const normalizedFormat = formatName.trim().toLowerCase();

  const brokerFormats = FORMATS.filter((format) => format.broker === normalizedBroker);
  if (!brokerFormats.length) {
    throw new ImportFormatError(`Broker '${broker}' not supported.`, supportedBrokers());
  }

  const match = brokerFormats.find((format) => format.formatName === normalizedFormat);
  if (!match) {
    throw new ImportFormatError(
      `Format '${formatName}' not supported for broker '${broker}'.`,
      brokerFormats.map((format) => format.formatName)
    );
  }
  return match.parse;
}
