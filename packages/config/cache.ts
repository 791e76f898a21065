/**
 * Cache Configuration
 *
 * Settings for the in-process read cache. The cache is off unless
 * CACHE_ENABLED is set explicitly.
 */

import { ConfigError } from '@errors';
import { getLogger } from '@kernel/logger';

import { envSchema } from './schema';

const logger = getLogger('config');

export interface CacheConfig {
  /** Global switch; when false every cache operation is a passthrough */
  globalCacheEnabled: boolean;
  ttlSeconds: number;
  /** LRU cap; undefined leaves the cache unbounded */
  maxEntries?: number | undefined;
  /** Minimum gap between opportunistic sweeps */
  sweepIntervalMs: number;
}

export interface ReadPathConfig {
  nodeEnv: 'development' | 'production' | 'test';
  cache: CacheConfig;
  databaseUrl?: string | undefined;
}

/**
 * Parse and validate the environment, failing fast on bad values.
 * @throws ConfigError listing every invalid variable
 */
export function loadReadPathConfig(env: NodeJS.ProcessEnv = process.env): ReadPathConfig {
  // Empty strings count as unset, matching how the rest of the platform reads env
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    }));
    logger.error('Invalid read path configuration', undefined, { issues });
    throw new ConfigError('Invalid read path configuration', issues);
  }

  const config = parsed.data;
  return {
    nodeEnv: config.NODE_ENV,
    cache: {
      globalCacheEnabled: config.CACHE_ENABLED,
      ttlSeconds: config.CACHE_TIMEOUT,
      maxEntries: config.CACHE_MAX_ENTRIES,
      sweepIntervalMs: config.CACHE_SWEEP_INTERVAL_MS,
    },
    databaseUrl: config.DATABASE_URL,
  };
}

/**
 * Cache section only, for callers that do not touch the store
 */
export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  return loadReadPathConfig(env).cache;
}
