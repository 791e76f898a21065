/**
 * Shared Database Package
 * Connection pool and PostgreSQL document store adapters
 */

export * from './pool';
export * from './jsonb';
export * from './sql-utils';
export * from './documents/filter';
export * from './documents/PostgresDocumentCollection';
export * from './documents/PostgresTextIndexedCollection';
