import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@soiree/shared';
import { type WithTransaction } from '@soiree/domain';

const logger = createLogger({ name: 'db' });

export interface Database {
  pool: Pool;
  withTransaction: WithTransaction<PoolClient>;
  close(): Promise<void>;
}

/**
 * Opens a pool and returns a handle that owns it. Callers pass the handle
 * around; nothing in this package keeps a module-level connection.
 */
export function createDatabase(config: PoolConfig): Database {
  const pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
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

  return {
    pool,
    withTransaction,
    async close() {
      await pool.end();
      logger.info({}, 'Database pool closed');
    },
  };
}

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}
