import { Pool, type PoolConfig } from 'pg';
import { createLogger } from '@voltgate/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export interface DatabaseOptions {
  connectionString: string;
  max?: number;
  /** Applied both client-side and as the server's statement_timeout. */
  queryTimeoutMs?: number;
  connectTimeoutMs?: number;
}

export function toPoolConfig(opts: DatabaseOptions): PoolConfig {
  const queryTimeoutMs = opts.queryTimeoutMs ?? 5000;
  return {
    connectionString: opts.connectionString,
    max: opts.max ?? 10,
    query_timeout: queryTimeoutMs,
    statement_timeout: queryTimeoutMs,
    connectionTimeoutMillis: opts.connectTimeoutMs ?? 5000,
  };
}

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(opts: DatabaseOptions): Pool {
  pool = new Pool(toPoolConfig(opts));
  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/** The slice of a pool or client the repositories need. */
export type Queryable = Pick<Pool, 'query'>;
