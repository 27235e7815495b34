import { Pool, QueryResult, QueryResultRow } from 'pg';
import { config } from '../config';
import logger from './logger';

const pool = new Pool({
  connectionString: config.databaseUrl,
});

pool.on('error', (err) => logger.error({ err }, 'PostgreSQL pool error'));

export type QueryFn = <R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
) => Promise<QueryResult<R>>;

export const query: QueryFn = <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
  pool.query<R>(text, params);

/**
 * Run `work` inside a transaction, rolling back if it throws.
 */
export const withTransaction = async <T>(work: (tx: QueryFn) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  const tx: QueryFn = <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
    client.query<R>(text, params);

  try {
    await client.query('BEGIN');
    const result = await work(tx);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

export default pool;
