import { parseArgs } from 'node:util';
import { HttpError, errorMessage } from '../errors.js';
import { describeAccount } from '../models.js';
import { createAccount } from '../services/accounts.js';

const USAGE = 'usage: create-account --account_number NUMBER [--name NAME] [--broker BROKER]';

export async function runCreateAccount(argv: string[]): Promise<number> {
  let values: { account_number?: string; name?: string; broker?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        account_number: { type: 'string' },
        name: { type: 'string' },
        broker: { type: 'string' },
      },
    }));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}\n${USAGE}`);
    return 1;
  }

  const accountNumber = values.account_number?.trim();
  if (!accountNumber) {
    console.error(`Error: --account_number is required\n${USAGE}`);
    return 1;
  }

  try {
    const account = await createAccount({
      accountNumber,
      userFriendlyName: values.name,
      brokerName: values.broker,
    });
    console.log(`Created account ${describeAccount(account)}`);
    return 0;
  } catch (error) {
    if (error instanceof HttpError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
