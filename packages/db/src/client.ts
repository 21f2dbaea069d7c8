import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@inkwell/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ max: config.max ?? 10 }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

interface ConnectionSource<C extends TransactionClient> {
  connect(): Promise<C>;
}

/**
 * Runs `fn` on one connection inside BEGIN/COMMIT. The caller's error always
 * wins: a failed ROLLBACK is logged and the connection is discarded instead of
 * going back to the pool.
 */
export async function runInTransaction<C extends TransactionClient, T>(
  source: ConnectionSource<C>,
  fn: (client: C) => Promise<T>,
): Promise<T> {
  const client = await source.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      logger.error({ err: broken.message }, 'Rollback failed, discarding connection');
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

export function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  return runInTransaction(getPool(), fn);
}
