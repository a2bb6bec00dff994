import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { Env } from './env.js';

export type Database = NodePgDatabase;

export type DatabaseConfig = Pick<
  Env,
  'DATABASE_URL' | 'DB_CONNECT_TIMEOUT_MS' | 'USAGE_REFRESH_TIMEOUT_MS'
>;

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    connectionString: config.DATABASE_URL,
    connectionTimeoutMillis: config.DB_CONNECT_TIMEOUT_MS,
    // No single statement may outlive the refresh allowance.
    statement_timeout: config.USAGE_REFRESH_TIMEOUT_MS,
    max: 2,
  });
}

/**
 * Scoped acquisition: open a pool, hand a Drizzle instance to `fn`, and
 * always close the pool afterwards, whether `fn` resolved or threw.
 */
export async function withDatabase<T>(
  config: DatabaseConfig,
  fn: (db: Database) => Promise<T>,
  openPool: (config: DatabaseConfig) => pg.Pool = createPool,
): Promise<T> {
  const pool = openPool(config);
  try {
    return await fn(drizzle(pool));
  } finally {
    await pool.end();
  }
}
