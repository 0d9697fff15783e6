import { describeDatabase, getDatabaseConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { ensureSchema } from '../schema.js';

export async function runCreateDb(): Promise<number> {
  try {
    await ensureSchema();
  } catch (error) {
    console.error(`Error creating tables on ${describeDatabase(getDatabaseConfig())}: ${errorMessage(error)}`);
    return 1;
  }
  console.log('Database tables created successfully.');
  return 0;
}
