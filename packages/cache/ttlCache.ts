import { LRUCache } from 'lru-cache';

import { ValidationError } from '@errors';
import { getLogger } from '@kernel/logger';

/**
* TTL Cache with optional LRU Eviction
* In-memory cache with time-to-live expiration.
*
* Expiry is decided here from each entry's storedAt, not by lru-cache, so
* an entry is fresh exactly while `now - storedAt < ttlMs`. Without
* `maxEntries` the cache is unbounded and only expiry, invalidation and
* clear remove entries. With it, expired entries are swept before the
* least recently used fresh entry is evicted.
*/

const logger = getLogger('cache');

export interface CacheEntry<T> {
  key: string;
  value: T;
  storedAt: number;
}

export interface CacheStats {
  size: number;
  maxEntries: number | null;
  hits: number;
  misses: number;
  evictions: number;
  enabled: boolean;
  ttlMs: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  /** Maximum number of entries before LRU eviction; unbounded when omitted */
  maxEntries?: number | undefined;
  /** Global switch; a disabled cache misses every read and ignores every write */
  enabled?: boolean | undefined;
  /** Clock in epoch milliseconds */
  now?: (() => number) | undefined;
}

export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

const MISS: CacheLookup<never> = { hit: false };

export class TtlCache<T = unknown> {
  private readonly store: LRUCache<string, CacheEntry<T>>;
  private readonly ttlMs: number;
  private readonly maxEntries: number | null;
  private readonly isEnabled: boolean;
  private readonly clock: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: TtlCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new ValidationError('Invalid TTL: must be a positive number');
    }

    this.maxEntries = options.maxEntries ?? null;
    if (this.maxEntries !== null && (!Number.isInteger(this.maxEntries) || this.maxEntries <= 0)) {
      throw new ValidationError('Invalid maxEntries: must be a positive integer');
    }

    this.ttlMs = options.ttlMs;
    this.isEnabled = options.enabled ?? true;
    this.clock = options.now ?? (() => Date.now());

    // lru-cache needs some bound; an unbounded cache counts every entry as size 1 under an unreachable total
    const bound = this.maxEntries === null
      ? { maxSize: Number.MAX_SAFE_INTEGER, sizeCalculation: () => 1 }
      : { max: this.maxEntries };

    this.store = new LRUCache<string, CacheEntry<T>>({
      ...bound,
      dispose: (_entry, key, reason) => {
        if (reason === 'evict') {
          this.evictions++;
          logger.debug('LRU eviction', { evictedKey: key, totalEvictions: this.evictions });
        }
      },
    });
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  now(): number {
    return this.clock();
  }

  /**
  * Look up a key, distinguishing a cached `undefined` from a miss
  */
  lookup(key: string): CacheLookup<T> {
    if (!this.isEnabled) return MISS;

    const entry = this.store.get(key);
    if (!entry) {
      this.misses++;
      return MISS;
    }

    if (this.isExpired(entry, this.clock())) {
      this.store.delete(key);
      this.misses++;
      return MISS;
    }

    this.hits++;
    return { hit: true, value: entry.value };
  }

  /**
  * Get a value from the cache
  * @returns Cached value or undefined if not found or expired
  */
  get(key: string): T | undefined {
    const result = this.lookup(key);
    return result.hit ? result.value : undefined;
  }

  /**
  * Store a value stamped with the current time, replacing any prior entry
  */
  set(key: string, value: T): void {
    if (!this.isEnabled) return;
    if (this.maxEntries !== null && this.store.size >= this.maxEntries && !this.store.has(key)) {
      this.sweep();
    }
    this.store.set(key, { key, value, storedAt: this.clock() });
  }

  invalidate(key: string): void {
    if (!this.isEnabled) return;
    this.store.delete(key);
  }

  /**
  * Remove every entry in a key namespace
  * @returns Number of entries removed
  */
  invalidatePrefix(prefix: string): number {
    if (!this.isEnabled) return 0;

    const doomed = [...this.store.keys()].filter(key => key.startsWith(prefix));
    for (const key of doomed) {
      this.store.delete(key);
    }
    return doomed.length;
  }

  clear(): void {
    if (!this.isEnabled) return;
    this.store.clear();
  }

  /**
  * Remove expired entries
  * @returns Number of entries removed
  */
  sweep(): number {
    if (!this.isEnabled || this.store.size === 0) return 0;

    const now = this.clock();
    const expired: string[] = [];
    for (const entry of this.store.values()) {
      if (this.isExpired(entry, now)) {
        expired.push(entry.key);
      }
    }

    for (const key of expired) {
      this.store.delete(key);
    }

    if (expired.length > 0) {
      logger.debug('Cache sweep', { removedEntries: expired.length, remainingEntries: this.store.size });
    }

    return expired.length;
  }

  getStats(): CacheStats {
    return {
      size: this.store.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      enabled: this.isEnabled,
      ttlMs: this.ttlMs,
    };
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.storedAt >= this.ttlMs;
  }
}
