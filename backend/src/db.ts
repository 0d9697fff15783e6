import pg from 'pg';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { describeDatabase, getDatabaseConfig } from './config.js';
import { createLogger } from './logger.js';

const DATE_OID = 1082;

// Keep `date` columns as YYYY-MM-DD instead of local-midnight Date objects.
pg.types.setTypeParser(DATE_OID, (value: string) => value);

const logger = createLogger('db');

let pool: Pool | null = null;

function getPool(): Pool {
  if (!pool) {
    const config = getDatabaseConfig();
    logger.debug(`connecting to ${describeDatabase(config)}`);
    pool = new pg.Pool(config);
    pool.on('error', (error) => {
      logger.error('idle client error', error.message);
    });
  }
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResult<T>> {
  if (client) {
    return client.query<T>(text, params);
  }
  return getPool().query<T>(text, params);
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
