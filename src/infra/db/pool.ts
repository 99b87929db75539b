import pg from 'pg';
import type { Logger } from '../logging/logger.js';

export interface PoolOptions {
  connectionString?: string;
  logger: Logger;
  max?: number;
}

/**
 * Postgres pool that reports connection events on the given logger.
 * Connecting is lazy, so a missing connection string only fails on first use.
 */
export function createPool(options: PoolOptions): pg.Pool {
  const db = new pg.Pool({
    connectionString: options.connectionString,
    max: options.max ?? 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  db.on('connect', () => {
    options.logger.debug('Database connection established');
  });
  db.on('error', (err) => {
    options.logger.error('Unexpected database error', { error: err.message });
  });

  return db;
}
