import { runCreateAccount } from '../src/cli/create-account.js';
import { runScript } from '../src/cli/run.js';

await runScript(runCreateAccount);
