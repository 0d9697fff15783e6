import { runImportCsv } from '../src/cli/import-csv.js';
import { runScript } from '../src/cli/run.js';

await runScript(runImportCsv);
