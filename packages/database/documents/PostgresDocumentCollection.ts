import type { Pool } from 'pg';
import type { z } from 'zod';

import { getLogger } from '@kernel/logger';
import { toError } from '@errors';
import type {
  DocumentCollection,
  DocumentFilter,
  DocumentPatch,
  StoredDocument,
} from '@domain/content/application/ports/DocumentCollection';

import { serializeForJSONB } from '../jsonb';
import { assertSafeIdentifier } from '../sql-utils';
import { buildWhereClause } from './filter';

const logger = getLogger('database:documents');

export type Queryable = Pick<Pool, 'query'>;

/** Schema that turns a stored JSONB value back into a typed document */
export type DocumentSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * DocumentCollection backed by a PostgreSQL table of JSONB documents.
 *
 * Table layout:
 *   CREATE TABLE <table> (
 *     seq BIGSERIAL,
 *     id TEXT PRIMARY KEY,
 *     doc JSONB NOT NULL
 *   );
 *
 * `seq` records insertion order, which is the natural order of every read.
 */
export class PostgresDocumentCollection<T extends StoredDocument> implements DocumentCollection<T> {
  protected readonly table: string;

  constructor(
    protected readonly pool: Queryable,
    table: string,
    protected readonly schema: DocumentSchema<T>
  ) {
    this.table = assertSafeIdentifier(table);
  }

  /**
   * Create the backing table if it does not exist
   */
  async ensureTable(): Promise<void> {
    try {
      await this.pool.query(`CREATE TABLE IF NOT EXISTS ${this.table} (
    seq BIGSERIAL,
    id TEXT PRIMARY KEY,
    doc JSONB NOT NULL
  )`);
    }
    catch (error) {
      logger.error('Failed to create document table', toError(error), { table: this.table });
      throw error;
    }
  }

  async find(filter: DocumentFilter<T> = {}): Promise<T[]> {
    const where = buildWhereClause(filter);
    try {
      const { rows } = await this.pool.query<{ doc: unknown }>(
        `SELECT doc FROM ${this.table} ${where.sql} ORDER BY seq`,
        where.params
      );
      return rows.map(row => this.schema.parse(row.doc));
    }
    catch (error) {
      logger.error('Failed to find documents', toError(error), { table: this.table });
      throw error;
    }
  }

  async findOne(filter: DocumentFilter<T>): Promise<T | null> {
    const where = buildWhereClause(filter);
    try {
      const { rows } = await this.pool.query<{ doc: unknown }>(
        `SELECT doc FROM ${this.table} ${where.sql} ORDER BY seq LIMIT 1`,
        where.params
      );
      const row = rows[0];
      return row ? this.schema.parse(row.doc) : null;
    }
    catch (error) {
      logger.error('Failed to find document', toError(error), { table: this.table });
      throw error;
    }
  }

  async insert(doc: T): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO ${this.table} (id, doc) VALUES ($1, $2::jsonb)`,
        [doc.id, serializeForJSONB(doc)]
      );
    }
    catch (error) {
      logger.error('Failed to insert document', toError(error), { table: this.table, id: doc.id });
      throw error;
    }
  }

  async update(filter: DocumentFilter<T>, patch: DocumentPatch<T>): Promise<number> {
    const where = buildWhereClause(filter, 2);
    try {
      const result = await this.pool.query(
        `UPDATE ${this.table} SET doc = doc || $1::jsonb ${where.sql}`,
        [serializeForJSONB(patch), ...where.params]
      );
      return result.rowCount ?? 0;
    }
    catch (error) {
      logger.error('Failed to update documents', toError(error), { table: this.table });
      throw error;
    }
  }

  async delete(filter: DocumentFilter<T>): Promise<number> {
    const where = buildWhereClause(filter);
    try {
      const result = await this.pool.query(
        `DELETE FROM ${this.table} ${where.sql}`,
        where.params
      );
      return result.rowCount ?? 0;
    }
    catch (error) {
      logger.error('Failed to delete documents', toError(error), { table: this.table });
      throw error;
    }
  }
}
