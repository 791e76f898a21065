/**
 * Read-Through Cache
 *
 * Compute-if-absent around named aggregations, with stampede protection for
 * concurrent misses and scoped invalidation.
 *
 * Stored results are deep-frozen and shared by every caller that reads them.
 */

import { getLogger } from '@kernel/logger';

import { deriveCacheKey, operationPrefix, type CacheArgs } from './cacheKey';
import type { CacheStats, TtlCache } from './ttlCache';

const logger = getLogger('ReadThroughCache');

/** Default gap between opportunistic sweeps (1 minute) */
const DEFAULT_SWEEP_INTERVAL_MS = 60000;

// ============================================================================
// Types & Interfaces
// ============================================================================

export type InvalidationScope =
  | { kind: 'key'; operation: string; args?: CacheArgs | undefined }
  | { kind: 'operation'; operation: string }
  | { kind: 'all' };

export interface ReadThroughCacheOptions {
  sweepIntervalMs?: number | undefined;
}

export interface AggregateOptions<T> {
  /** Results failing this predicate are returned but not stored */
  cacheIf?: ((value: T) => boolean) | undefined;
}

export interface ReadThroughStats extends CacheStats {
  inFlight: number;
}

interface FlightState {
  invalidated: boolean;
}

interface InFlightEntry {
  promise: Promise<unknown>;
  state: FlightState;
}

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}

// ============================================================================
// Read-Through Cache Class
// ============================================================================

export class ReadThroughCache {
  private readonly inFlight = new Map<string, InFlightEntry>();
  private readonly sweepIntervalMs: number;
  private lastSweepAt: number;

  constructor(
    private readonly cache: TtlCache,
    options: ReadThroughCacheOptions = {}
  ) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.lastSweepAt = cache.now();
  }

  get globalCacheEnabled(): boolean {
    return this.cache.enabled;
  }

  keyFor(operation: string, args: CacheArgs = []): string {
    return deriveCacheKey(operation, args);
  }

  /**
   * Return the cached result of `operation(args)` or compute and store it.
   *
   * A rejected computation is never stored and its error reaches every caller
   * waiting on it. A stored result is frozen before any caller sees it. With
   * the cache disabled this is a plain call to `compute`.
   */
  async cachedAggregate<T>(
    operation: string,
    args: CacheArgs,
    compute: () => Promise<T>,
    options: AggregateOptions<T> = {}
  ): Promise<T> {
    if (!this.cache.enabled) {
      return compute();
    }

    const key = deriveCacheKey(operation, args);
    this.maybeSweep();

    const cached = this.cache.lookup(key);
    if (cached.hit) {
      logger.debug('Cache hit', { operation });
      // A key is only ever written by compute() of the same operation
      return cached.value as T;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug('Joining in-flight computation', { operation });
      return pending.promise as Promise<T>;
    }

    logger.debug('Cache miss', { operation });

    const state: FlightState = { invalidated: false };
    const computation = this.computeAndStore(key, state, compute, options.cacheIf);
    this.inFlight.set(key, { promise: computation, state });

    try {
      return await computation;
    } finally {
      // An invalidation may already have replaced this entry with a newer one
      if (this.inFlight.get(key)?.state === state) {
        this.inFlight.delete(key);
      }
    }
  }

  /**
   * Drop cached results in a scope. Computations running in the scope still
   * answer their callers but will not store their result.
   */
  invalidate(scope: InvalidationScope): void {
    switch (scope.kind) {
      case 'key': {
        const key = deriveCacheKey(scope.operation, scope.args ?? []);
        this.cache.invalidate(key);
        this.abandonInFlight(candidate => candidate === key);
        logger.debug('Invalidated key', { operation: scope.operation });
        break;
      }
      case 'operation': {
        const prefix = operationPrefix(scope.operation);
        const removed = this.cache.invalidatePrefix(prefix);
        this.abandonInFlight(candidate => candidate.startsWith(prefix));
        logger.debug('Invalidated operation', { operation: scope.operation, removed });
        break;
      }
      case 'all':
        this.cache.clear();
        this.abandonInFlight(() => true);
        logger.debug('Cleared cache');
        break;
    }
  }

  /**
   * Sweep expired entries if the sweep interval has elapsed since the last one
   * @returns Number of entries removed
   */
  maybeSweep(): number {
    if (!this.cache.enabled) return 0;

    const now = this.cache.now();
    if (now - this.lastSweepAt < this.sweepIntervalMs) return 0;

    this.lastSweepAt = now;
    return this.cache.sweep();
  }

  stats(): ReadThroughStats {
    return { ...this.cache.getStats(), inFlight: this.inFlight.size };
  }

  private async computeAndStore<T>(
    key: string,
    state: FlightState,
    compute: () => Promise<T>,
    cacheIf?: (value: T) => boolean
  ): Promise<T> {
    const value = await compute();
    if (state.invalidated) {
      logger.debug('Discarding result invalidated during computation', { key });
    } else if (cacheIf === undefined || cacheIf(value)) {
      this.cache.set(key, deepFreeze(value));
    }
    return value;
  }

  private abandonInFlight(matches: (key: string) => boolean): void {
    for (const [key, entry] of [...this.inFlight]) {
      if (matches(key)) {
        entry.state.invalidated = true;
        this.inFlight.delete(key);
      }
    }
  }
}
