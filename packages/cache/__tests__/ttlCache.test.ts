/**
 * TTL Cache Tests
 *
 * Freshness is `now - storedAt < ttl`; the clock is injected so each
 * boundary can be hit exactly.
 */

import { ValidationError } from '@errors';

import { TtlCache } from '../ttlCache';

describe('TtlCache', () => {
  let now: number;
  let cache: TtlCache<string>;

  beforeEach(() => {
    now = 10_000;
    cache = new TtlCache<string>({ ttlMs: 1000, now: () => now });
  });

  describe('expiry', () => {
    it('should return the value while younger than the TTL', () => {
      cache.set('k', 'v');
      now += 999;
      expect(cache.get('k')).toBe('v');
    });

    it('should miss exactly at the TTL', () => {
      cache.set('k', 'v');
      now += 1000;
      expect(cache.get('k')).toBeUndefined();
      expect(cache.getStats().size).toBe(0);
    });

    it('should restart the clock when a key is overwritten', () => {
      cache.set('k', 'first');
      now += 800;
      cache.set('k', 'second');
      now += 800;
      expect(cache.get('k')).toBe('second');
    });

    it('should distinguish a cached undefined from a miss', () => {
      const loose = new TtlCache<string | undefined>({ ttlMs: 1000, now: () => now });
      loose.set('empty', undefined);
      expect(loose.lookup('empty')).toEqual({ hit: true, value: undefined });
      expect(loose.lookup('absent')).toEqual({ hit: false });
    });
  });

  describe('invalidation', () => {
    it('should miss after invalidate', () => {
      cache.set('k', 'v');
      cache.invalidate('k');
      expect(cache.get('k')).toBeUndefined();
    });

    it('should treat invalidating an absent key as a no-op', () => {
      expect(() => cache.invalidate('missing')).not.toThrow();
    });

    it('should remove only keys under a prefix', () => {
      cache.set('listPosts:[[],{}]', 'a');
      cache.set('listPosts:[[1],{}]', 'b');
      cache.set('searchPosts:[["x"],{}]', 'c');

      expect(cache.invalidatePrefix('listPosts:')).toBe(2);
      expect(cache.get('listPosts:[[],{}]')).toBeUndefined();
      expect(cache.get('searchPosts:[["x"],{}]')).toBe('c');
    });

    it('should miss every key after clear', () => {
      cache.set('a', '1');
      cache.set('b', '2');
      cache.clear();
      expect(cache.get('a')).toBeUndefined();
      expect(cache.get('b')).toBeUndefined();
    });
  });

  describe('sweep', () => {
    it('should remove expired entries and keep fresh ones', () => {
      cache.set('old', '1');
      now += 600;
      cache.set('new', '2');
      now += 400;

      expect(cache.sweep()).toBe(1);
      expect(cache.getStats().size).toBe(1);
      expect(cache.get('new')).toBe('2');
    });

    it('should be a no-op on a clean cache', () => {
      cache.set('k', 'v');
      expect(cache.sweep()).toBe(0);
      expect(cache.sweep()).toBe(0);
      expect(cache.getStats().size).toBe(1);
    });
  });

  describe('size bound', () => {
    it('should evict the least recently used entry', () => {
      const small = new TtlCache<number>({ ttlMs: 1000, maxEntries: 2, now: () => now });
      small.set('a', 1);
      small.set('b', 2);
      expect(small.get('a')).toBe(1);
      small.set('c', 3);

      expect(small.get('b')).toBeUndefined();
      expect(small.get('a')).toBe(1);
      expect(small.get('c')).toBe(3);
      expect(small.getStats().evictions).toBe(1);
    });

    it('should keep every fresh entry when no cap is set', () => {
      const keys = Array.from({ length: 2500 }, (_, i) => `k${i}`);
      for (const key of keys) {
        cache.set(key, `v-${key}`);
      }
      now += 999;

      expect(keys.every(key => cache.get(key) === `v-${key}`)).toBe(true);
      expect(cache.getStats()).toMatchObject({ size: 2500, maxEntries: null, evictions: 0 });
    });

    it('should sweep expired entries before evicting a fresh one', () => {
      const small = new TtlCache<number>({ ttlMs: 1000, maxEntries: 2, now: () => now });
      small.set('stale', 1);
      now += 1000;
      small.set('b', 2);
      small.set('c', 3);

      expect(small.get('b')).toBe(2);
      expect(small.get('c')).toBe(3);
      expect(small.getStats()).toMatchObject({ size: 2, evictions: 0 });
    });
  });

  describe('global switch', () => {
    it('should miss every read and ignore every write when disabled', () => {
      const disabled = new TtlCache<string>({ ttlMs: 1000, enabled: false, now: () => now });
      disabled.set('k', 'v');

      expect(disabled.get('k')).toBeUndefined();
      expect(disabled.invalidatePrefix('k')).toBe(0);
      expect(disabled.sweep()).toBe(0);
      expect(disabled.getStats()).toEqual({
        size: 0,
        maxEntries: null,
        hits: 0,
        misses: 0,
        evictions: 0,
        enabled: false,
        ttlMs: 1000,
      });
    });
  });

  describe('statistics', () => {
    it('should count hits and misses', () => {
      cache.set('k', 'v');
      cache.get('k');
      cache.get('k');
      cache.get('other');

      const stats = cache.getStats();
      expect(stats.hits).toBe(2);
      expect(stats.misses).toBe(1);
    });
  });

  describe('options', () => {
    it('should reject a non-positive TTL', () => {
      expect(() => new TtlCache({ ttlMs: 0 })).toThrow(ValidationError);
    });

    it('should reject a non-positive size bound', () => {
      expect(() => new TtlCache({ ttlMs: 1000, maxEntries: 0 })).toThrow(ValidationError);
    });

    it('should use the wall clock by default', () => {
      vi.useFakeTimers();
      try {
        vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
        const wall = new TtlCache<string>({ ttlMs: 1000 });
        wall.set('k', 'v');
        vi.setSystemTime(new Date('2024-01-01T00:00:00.999Z'));
        expect(wall.get('k')).toBe('v');
        vi.setSystemTime(new Date('2024-01-01T00:00:01Z'));
        expect(wall.get('k')).toBeUndefined();
      } finally {
        vi.useRealTimers();
      }
    });
  });
});
