import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { fakeDb } from '../testing/fake-db.js';
import { runCreateAccount } from './create-account.js';

vi.mock('../db.js', () => import('../testing/fake-db.js'));

let log: MockInstance;
let error: MockInstance;

beforeEach(() => {
  fakeDb.reset();
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
  error = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runCreateAccount', () => {
  it('creates an account', async () => {
    const code = await runCreateAccount(['--account_number', '1234-5678', '--name', 'Brokerage', '--broker', 'schwab']);

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith('Created account #1 1234-5678 (Brokerage)');
    expect(fakeDb.tables.accounts[0]).toMatchObject({
      account_number: '1234-5678',
      user_friendly_name: 'Brokerage',
      broker_name: 'schwab',
    });
  });

  it('requires an account number', async () => {
    const code = await runCreateAccount(['--name', 'Brokerage']);

    expect(code).toBe(1);
    expect(error.mock.calls[0][0]).toBe(
      'Error: --account_number is required\nusage: create-account --account_number NUMBER [--name NAME] [--broker BROKER]'
    );
  });

  it('reports duplicate account numbers', async () => {
    fakeDb.seedAccount('1234-5678');

    const code = await runCreateAccount(['--account_number=1234-5678']);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith("Error: account number '1234-5678' already exists.");
  });

  it('rejects unknown options', async () => {
    const code = await runCreateAccount(['--account_number=1', '--colour=blue']);

    expect(code).toBe(1);
    expect(log).not.toHaveBeenCalled();
  });
});
