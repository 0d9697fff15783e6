import { closePool } from '../db.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';

export type ScriptMain = (argv: string[]) => Promise<number>;

const logger = createLogger('cli');

/** Runs a script entry point, sets the exit code and always releases the pool. */
export async function runScript(main: ScriptMain, argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    process.exitCode = await main(argv);
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}
