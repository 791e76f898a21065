import type { DocumentFilter } from '@domain/content/application/ports/DocumentCollection';

import { assertSafeIdentifier } from '../sql-utils';

export interface WhereClause {
  sql: string;
  params: unknown[];
}

export function isInCondition(condition: unknown): condition is { $in: readonly unknown[] } {
  return (
    typeof condition === 'object' &&
    condition !== null &&
    '$in' in condition &&
    Array.isArray(condition.$in)
  );
}

/**
 * Translate a document filter into a WHERE clause over the `doc` JSONB column.
 * Values are compared as JSONB so numbers, booleans and strings keep their type.
 *
 * @param firstParam - Index of the first placeholder ($n) this clause may use
 */
export function buildWhereClause<T>(filter: DocumentFilter<T>, firstParam = 1): WhereClause {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const entries: [string, unknown][] = Object.entries(filter);

  for (const [field, condition] of entries) {
    if (condition === undefined) continue;

    const column = `doc->'${assertSafeIdentifier(field)}'`;
    const placeholder = `$${firstParam + params.length}`;

    if (isInCondition(condition)) {
      conditions.push(`${column} = ANY(${placeholder}::jsonb[])`);
      params.push(condition.$in.map(value => JSON.stringify(value)));
    } else {
      conditions.push(`${column} = ${placeholder}::jsonb`);
      params.push(JSON.stringify(condition));
    }
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}
