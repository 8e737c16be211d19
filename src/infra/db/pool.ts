import pg from 'pg';
import type { Pool } from 'pg';
import type { Logger } from 'pino';
import type { DatabaseConfig } from '../../config.js';

/**
 * Create the shared connection pool. Nothing connects until the first query,
 * so unit tests can build the app graph without a database.
 */
export function createPool(config: DatabaseConfig, logger: Logger): Pool {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    // Server-side bound for statements whose caller has already gone away
    statement_timeout: config.statementTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
