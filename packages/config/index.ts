/**
 * Shared Configuration Package
 *
 * @example
 * ```typescript
 * import { loadReadPathConfig } from '@config';
 *
 * const config = loadReadPathConfig();
 * if (config.cache.globalCacheEnabled) {
 *   // cache is live
 * }
 * ```
 *
 * @module @config
 */

export { envSchema, type EnvConfig } from './schema';
export {
  loadReadPathConfig,
  loadCacheConfig,
  type CacheConfig,
  type ReadPathConfig,
} from './cache';
