import { runCreateDb } from '../src/cli/create-db.js';
import { runScript } from '../src/cli/run.js';

await runScript(runCreateDb);
