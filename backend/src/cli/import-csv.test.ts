import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { fakeDb } from '../testing/fake-db.js';
import { runImportCsv } from './import-csv.js';

vi.mock('../db.js', () => import('../testing/fake-db.js'));

const EXPORT = [
  'Date,Action,Symbol,Description,Quantity,Price,Fees & Comm,Amount',
  '05/19/2025,Buy,NVDA,NVIDIA CORP,100,$135.50,,"($13,550.00)"',
  '05/15/2025,Sell to Open,MSFT 12/18/2026 400.00 P,"PUT MICROSOFT CORP $400 EXP 12/18/26",3,$27.18,$1.98,"$8,152.02"',
  '05/14/2025,Stock Split,AAPL,APPLE INC,3,,,',
].join('\n');

let dir: string;
let log: MockInstance;
let warn: MockInstance;
let error: MockInstance;

function lines(spy: MockInstance): unknown[] {
  return spy.mock.calls.map((call) => call[0]);
}

async function writeExport(content: string): Promise<string> {
  const filepath = path.join(dir, 'export.csv');
  await writeFile(filepath, content, 'utf8');
  return filepath;
}

beforeEach(async () => {
  fakeDb.reset();
  dir = await mkdtemp(path.join(tmpdir(), 'import-csv-'));
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
  warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  error = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('runImportCsv', () => {
  it('imports every parsed transaction', async () => {
    const accountId = fakeDb.seedAccount('12345XYZ');
    const filepath = await writeExport(EXPORT);

    const code = await runImportCsv([
      '--account_id',
      String(accountId),
      '--broker',
      'schwab',
      '--format_name',
      'transactions_v1',
      '--filepath',
      filepath,
    ]);

    expect(code).toBe(0);
    expect(lines(log)).toEqual([
      `Attempting to import file: ${filepath} for account ID: 1`,
      'Parser returned 2 potential transactions.',
      'Successfully imported 2 transactions into account 1.',
    ]);
    expect(lines(warn)).toContain("Skipping row 4: unmapped action 'Stock Split'");
    expect(fakeDb.tables.transactions.map((row) => row.ticker)).toEqual(['NVDA', 'MSFT']);
    expect(fakeDb.tables.import_batches[0]).toMatchObject({
      broker: 'schwab',
      format_name: 'transactions_v1',
      filename: filepath,
      parsed_count: 2,
    });
  });

  it('prints parsed rows without writing on a dry run', async () => {
    const filepath = await writeExport(EXPORT);

    const code = await runImportCsv([
      '--account_id=7',
      '--broker=schwab',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
      '--dry-run',
    ]);

    expect(code).toBe(0);
    expect(lines(log)).toEqual([
      `Attempting to import file: ${filepath} for account ID: 7`,
      'Parser returned 2 potential transactions.',
      'Item 1: 2025-05-19 BUY NVDA qty=100 price=135.5 fees=0 amount=-13550',
      'Item 2: 2025-05-15 SELL_TO_OPEN MSFT qty=3 price=27.18 fees=1.98 amount=8152.02 PUT 400 exp 2026-12-18',
    ]);
    expect(fakeDb.statements).toEqual([]);
  });

  it('reports a missing file', async () => {
    const filepath = path.join(dir, 'missing.csv');

    const code = await runImportCsv([
      '--account_id=1',
      '--broker=schwab',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
    ]);

    expect(code).toBe(1);
    expect(lines(error)).toEqual([`Error: File not found at ${filepath}`]);
  });

  it('reports an unsupported broker', async () => {
    const filepath = await writeExport(EXPORT);

    const code = await runImportCsv([
      '--account_id=1',
      '--broker=fidelity',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
    ]);

    expect(code).toBe(1);
    expect(lines(error)).toEqual(["Error: Broker 'fidelity' not supported."]);
  });

  it('reports a file that is not valid CSV', async () => {
    fakeDb.seedAccount('12345XYZ');
    const filepath = await writeExport(
      'Date,Action,Symbol,Description,Quantity,Price,Fees & Comm,Amount\n05/19/2025,Buy,NVDA,"NVIDIA CORP,1,$1.00,,($1.00)'
    );

    const code = await runImportCsv([
      '--account_id=1',
      '--broker=schwab',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
    ]);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^Error: unreadable CSV: Quote Not Closed/);
    expect(fakeDb.tables.import_batches).toEqual([]);
  });

  it('rejects a non-numeric account id', async () => {
    const code = await runImportCsv(['--account_id=abc', '--broker=schwab', '--format_name=transactions_v1', '--filepath=x.csv']);

    expect(code).toBe(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^Error: --account_id: /);
    expect(log).not.toHaveBeenCalled();
  });

  it('stops when nothing was parsed', async () => {
    const filepath = await writeExport('Date,Action,Symbol,Description,Quantity,Price,Fees & Comm,Amount\n');

    const code = await runImportCsv([
      '--account_id=1',
      '--broker=schwab',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
    ]);

    expect(code).toBe(0);
    expect(lines(log).at(-1)).toBe('No transactions were parsed from the file.');
  });

  it('reports an unknown account', async () => {
    const filepath = await writeExport(EXPORT);

    const code = await runImportCsv([
      '--account_id=42',
      '--broker=schwab',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
    ]);

    expect(code).toBe(1);
    expect(lines(error)).toEqual(['Error: Account with ID 42 not found.']);
  });

  it('reports database failures', async () => {
    fakeDb.seedAccount('12345XYZ');
    fakeDb.failOn(/^insert into import_batches/, new Error('connection terminated'));
    const filepath = await writeExport(EXPORT);

    const code = await runImportCsv([
      '--account_id=1',
      '--broker=schwab',
      '--format_name=transactions_v1',
      `--filepath=${filepath}`,
    ]);

    expect(code).toBe(1);
    expect(lines(error)).toEqual(['An error occurred during the import process: connection terminated']);
    expect(fakeDb.tables.transactions).toEqual([]);
  });
});
