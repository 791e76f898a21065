import { ValidationError } from '@errors';

import { deriveCacheKey, operationPrefix } from '../cacheKey';

describe('deriveCacheKey', () => {
  it('should prefix the canonical arguments with the operation name', () => {
    expect(deriveCacheKey('getPostWithComments', ['42'])).toBe('getPostWithComments:[["42"],{}]');
    expect(deriveCacheKey('listPosts')).toBe('listPosts:[[],{}]');
  });

  it('should ignore the order named arguments were given in', () => {
    const a = deriveCacheKey('searchPosts', { positional: ['ocean'], named: { page: 2, limit: 10 } });
    const b = deriveCacheKey('searchPosts', { positional: ['ocean'], named: { limit: 10, page: 2 } });
    expect(a).toBe(b);
    expect(a).toBe('searchPosts:[["ocean"],{"limit":n:10,"page":n:2}]');
  });

  it('should respect positional order', () => {
    expect(deriveCacheKey('op', ['a', 'b'])).not.toBe(deriveCacheKey('op', ['b', 'a']));
  });

  it('should sort nested object keys', () => {
    expect(deriveCacheKey('op', [{ b: 1, a: { d: 2, c: 3 } }])).toBe(
      deriveCacheKey('op', [{ a: { c: 3, d: 2 }, b: 1 }])
    );
  });

  it('should give distinct keys to values that print alike', () => {
    const values: unknown[] = [1, '1', true, 'true', null, 'null', undefined, Number.NaN, 1n, new Date(0), [1], { 0: 1 }];
    const keys = values.map(value => deriveCacheKey('op', [value]));
    expect(new Set(keys).size).toBe(values.length);
  });

  it('should serialize holes in sparse arrays', () => {
    expect(deriveCacheKey('op', [new Array(2)])).toBe('op:[[[undefined,undefined]],{}]');
    expect(deriveCacheKey('op', [new Array(1)])).not.toBe(deriveCacheKey('op', [[]]));
  });

  it('should not let a string forge a separator', () => {
    expect(deriveCacheKey('op', ['a","b'])).not.toBe(deriveCacheKey('op', ['a', 'b']));
  });

  it('should reject functions and symbols', () => {
    expect(() => deriveCacheKey('op', [() => 1])).toThrow(ValidationError);
    expect(() => deriveCacheKey('op', [Symbol('s')])).toThrow(ValidationError);
  });

  it('should reject class instances and cycles', () => {
    class Thing {}
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    expect(() => deriveCacheKey('op', [new Thing()])).toThrow('Cache key arguments must be plain data');
    expect(() => deriveCacheKey('op', [cyclic])).toThrow('Cannot derive a cache key from a circular structure');
  });

  it('should accept the same object twice when it is not a cycle', () => {
    const shared = { a: 1 };
    expect(deriveCacheKey('op', [shared, shared])).toBe('op:[[{"a":n:1},{"a":n:1}],{}]');
  });

  it('should reject operation names that could clash with the separator', () => {
    expect(() => deriveCacheKey('', [])).toThrow(ValidationError);
    expect(() => deriveCacheKey('list:posts', [])).toThrow(ValidationError);
    expect(operationPrefix('content.listPosts')).toBe('content.listPosts:');
  });
});
