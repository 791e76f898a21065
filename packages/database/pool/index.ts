import { Pool } from 'pg';

import { getLogger } from '@kernel/logger';
import { ConfigError } from '@errors';

const logger = getLogger('database:pool');

export interface PoolOptions {
  /** Maximum connections (default 10) */
  max?: number | undefined;
  /** Per-statement timeout in milliseconds (default 30s) */
  statementTimeoutMs?: number | undefined;
}

/**
 * Create a connection pool for the document store
 * @throws ConfigError when no connection string is configured
 */
export function createPool(connectionString: string | undefined, options: PoolOptions = {}): Pool {
  if (!connectionString) {
    throw new ConfigError('DATABASE_URL is required to connect to the document store');
  }

  const pool = new Pool({
    connectionString,
    statement_timeout: options.statementTimeoutMs ?? 30000,
    max: options.max ?? 10,
    // Close idle connections after 30 seconds
    idleTimeoutMillis: 30000,
    // Fail fast if can't connect within 5 seconds
    connectionTimeoutMillis: 5000,
  });

  // Idle client errors would otherwise crash the process
  pool.on('error', (err) => {
    logger.error('Unexpected pool error', err);
  });

  return pool;
}
