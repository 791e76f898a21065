/**
 * Read Cache Package
 *
 * Provides the in-process read cache:
 * - TTL cache with an optional LRU size bound and a global switch
 * - Canonical cache key derivation
 * - Read-through aggregation with stampede protection and scoped invalidation
 */

export * from './ttlCache';
export * from './cacheKey';
export * from './readThroughCache';
