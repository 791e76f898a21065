import { getLogger } from '@kernel/logger';
import { SearchIndexError, toError } from '@errors';
import type { StoredDocument } from '@domain/content/application/ports/DocumentCollection';
import type {
  TextField,
  TextHit,
  TextIndexedCollection,
} from '@domain/content/application/ports/TextIndexedCollection';

import { assertSafeIdentifier, sanitizeFtsQuery } from '../sql-utils';
import { PostgresDocumentCollection } from './PostgresDocumentCollection';

const logger = getLogger('database:text-index');

const TS_CONFIG = 'english';

/**
 * Document collection with PostgreSQL full-text search over chosen fields.
 *
 * Each indexed field gets a GIN expression index:
 *   CREATE INDEX <table>_<field>_fts ON <table>
 *     USING GIN (to_tsvector('english', coalesce(doc->>'<field>', '')));
 *
 * Queries match the concatenated field vectors with plainto_tsquery and score
 * with ts_rank. Any failure surfaces as SearchIndexError.
 */
export class PostgresTextIndexedCollection<T extends StoredDocument>
  extends PostgresDocumentCollection<T>
  implements TextIndexedCollection<T> {

  private readonly indexedFields = new Set<string>();

  async createTextIndex(field: TextField<T>): Promise<void> {
    const name = this.indexName(field);
    try {
      await this.pool.query(
        `CREATE INDEX IF NOT EXISTS ${name} ON ${this.table} USING GIN (${this.fieldVector(field)})`
      );
      this.indexedFields.add(field);
      logger.info('Text index ready', { table: this.table, field });
    }
    catch (error) {
      logger.error('Failed to create text index', toError(error), { table: this.table, field });
      throw error;
    }
  }

  async reindex(field: TextField<T>): Promise<void> {
    try {
      await this.pool.query(`REINDEX INDEX ${this.indexName(field)}`);
      this.indexedFields.add(field);
    }
    catch (error) {
      logger.error('Failed to rebuild text index', toError(error), { table: this.table, field });
      throw error;
    }
  }

  async query(text: string): Promise<TextHit<T>[]> {
    if (this.indexedFields.size === 0) {
      throw new SearchIndexError(`No text index on ${this.table}`);
    }

    const terms = sanitizeFtsQuery(text);
    if (!terms) {
      throw new SearchIndexError('Query has no indexable terms');
    }

    const vector = [...this.indexedFields].map(field => this.fieldVector(field)).join(' || ');
    let rows: { doc: unknown; score: unknown }[];
    try {
      const result = await this.pool.query<{ doc: unknown; score: unknown }>(
        `SELECT doc, ts_rank(${vector}, plainto_tsquery('${TS_CONFIG}', $1)) AS score
    FROM ${this.table}
    WHERE ${vector} @@ plainto_tsquery('${TS_CONFIG}', $1)
    ORDER BY seq`,
        [terms]
      );
      rows = result.rows;
    }
    catch (error) {
      throw new SearchIndexError('Text query failed', { cause: error });
    }

    return rows.map(row => ({ record: this.schema.parse(row.doc), score: Number(row.score) }));
  }

  private indexName(field: string): string {
    return assertSafeIdentifier(`${this.table}_${field}_fts`);
  }

  private fieldVector(field: string): string {
    return `to_tsvector('${TS_CONFIG}', coalesce(doc->>'${assertSafeIdentifier(field)}', ''))`;
  }
}
