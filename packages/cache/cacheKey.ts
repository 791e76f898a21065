/**
 * Cache Key Derivation
 *
 * Keys have the form `<operation>:<canonical arguments>`. The canonical form
 * is a full serialization rather than a hash, so two keys are equal exactly
 * when the operation and every argument value are equal.
 */

import { ValidationError } from '@errors';

/** Operation names double as invalidation namespaces and may not contain ':' */
const OPERATION_PATTERN = /^[A-Za-z][\w.-]*$/;

export type NamedArgs = Readonly<Record<string, unknown>>;

/**
 * Arguments of a cached call: positional only, or positional plus named.
 */
export type CacheArgs =
  | readonly unknown[]
  | {
      positional?: readonly unknown[] | undefined;
      named?: NamedArgs | undefined;
    };

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Serialize a value so that distinct values never share a representation.
 * Scalars carry a type tag; object keys are sorted.
 */
function canonicalize(value: unknown, ancestors: Set<object>): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return `n:${String(value)}`;
    case 'bigint':
      return `b:${value.toString()}`;
    case 'boolean':
      return value ? 'true' : 'false';
  }

  if (typeof value !== 'object') {
    throw new ValidationError(`Cannot derive a cache key from a ${typeof value}`);
  }

  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? 'd:invalid' : `d:${value.toISOString()}`;
  }

  if (ancestors.has(value)) {
    throw new ValidationError('Cannot derive a cache key from a circular structure');
  }
  ancestors.add(value);

  try {
    if (Array.isArray(value)) {
      // Array.from visits holes, which map() would skip
      return `[${Array.from(value, item => canonicalize(item, ancestors)).join(',')}]`;
    }

    if (!isPlainObject(value)) {
      throw new ValidationError('Cache key arguments must be plain data');
    }

    const record = value;
    const fields = Object.keys(record)
      .sort()
      .map(name => `${JSON.stringify(name)}:${canonicalize(record[name], ancestors)}`);
    return `{${fields.join(',')}}`;
  } finally {
    ancestors.delete(value);
  }
}

function isPositionalOnly(args: CacheArgs): args is readonly unknown[] {
  return Array.isArray(args);
}

function splitArgs(args: CacheArgs): { positional: readonly unknown[]; named: NamedArgs } {
  if (isPositionalOnly(args)) {
    return { positional: args, named: {} };
  }
  return { positional: args.positional ?? [], named: args.named ?? {} };
}

/**
 * Validate an operation name for use as a key namespace
 * @throws ValidationError when the name is empty or contains a separator
 */
export function assertOperationName(operation: string): void {
  if (!OPERATION_PATTERN.test(operation)) {
    throw new ValidationError(`Invalid cache operation name: '${operation}'`);
  }
}

/**
 * Prefix shared by every key of an operation
 */
export function operationPrefix(operation: string): string {
  assertOperationName(operation);
  return `${operation}:`;
}

/**
 * Derive the cache key of a call.
 *
 * Positional order matters; named arguments are sorted by name first.
 *
 * @example
 * ```typescript
 * deriveCacheKey('getPostWithComments', ['42']);
 * // => 'getPostWithComments:[["42"],{}]'
 * ```
 */
export function deriveCacheKey(operation: string, args: CacheArgs = []): string {
  const { positional, named } = splitArgs(args);
  return `${operationPrefix(operation)}${canonicalize([positional, named], new Set())}`;
}
