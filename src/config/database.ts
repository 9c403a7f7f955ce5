import { Pool, types } from 'pg';
import { AppConfig } from './env';

// DATE columns come back as 'YYYY-MM-DD' strings instead of local-midnight Dates.
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

/**
 * The slice of a pg Pool/PoolClient the stores use. Rows are returned as
 * `unknown` and narrowed by the caller.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface PooledClient extends Queryable {
  release(): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export function createPool(db: AppConfig['db']): Pool {
  const pool = new Pool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
  });

  pool.on('error', (err) => {
    console.error('[Database] Unexpected error on idle client', err);
  });

  return pool;
}

/**
 * Run a callback inside a transaction holding a transaction-scoped advisory
 * lock on `lockKey`. Concurrent callers with the same key queue on the lock;
 * COMMIT or ROLLBACK releases it.
 */
export async function withLockedTransaction<T>(
  pool: ConnectionPool,
  lockKey: string,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [lockKey]);
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Run read-only queries against one consistent snapshot, so a multi-query
 * read never mixes state from before and after another transaction's commit.
 */
export async function withReadSnapshot<T>(
  pool: ConnectionPool,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
