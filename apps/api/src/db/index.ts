import pg, { QueryResultRow } from 'pg';
import type { AppConfig } from '../config.js';

const { Pool } = pg;

/** Anything that can run a query: the pool (autocommit) or a client inside a transaction. */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<pg.QueryResult<T>>;
}

/** A pooled connection, held for the lifetime of one transaction. */
export interface PooledClient extends Queryable {
  release(): void;
}

/** The parts of pg.Pool the service uses. */
export interface DatabasePool extends Queryable {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export function createPool(db: AppConfig['db']): pg.Pool {
  return new Pool({
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    password: db.password,

    // Managed Postgres usually requires SSL; local Postgres usually does not
    ssl: db.ssl ? { rejectUnauthorized: false } : undefined,

    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
}

export interface TransactionOptions {
  /** Upper bound on any single row-lock wait inside the transaction. */
  lockTimeoutMs?: number;
}

export async function transaction<T>(
  pool: DatabasePool,
  fn: (client: PooledClient) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    if (options.lockTimeoutMs !== undefined) {
      // SET LOCAL cannot take bind parameters; set_config(..., true) is the transaction-scoped equivalent
      await client.query(`SELECT set_config('lock_timeout', $1, true)`, [`${Math.max(1, Math.ceil(options.lockTimeoutMs))}ms`]);
    }
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
