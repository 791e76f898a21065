import type { DocumentCollection, StoredDocument } from './DocumentCollection';

/** String-valued fields of T that a text index can cover */
export type TextField<T> = {
  [K in keyof T]-?: T[K] extends string ? K : never;
}[keyof T] & string;

export interface TextHit<T> {
  record: T;
  /** Index-native relevance; higher is better */
  score: number;
}

/**
* A document collection with a full-text index.
*/
export interface TextIndexedCollection<T extends StoredDocument> extends DocumentCollection<T> {
  createTextIndex(field: TextField<T>): Promise<void>;

  /**
  * Rebuild the index for a field from the stored documents
  */
  reindex(field: TextField<T>): Promise<void>;

  /**
  * Query every indexed field. Hits come back in store order, unsorted.
  *
  * @throws {SearchIndexError} when the text cannot be tokenized or the index
  * cannot answer
  */
  query(text: string): Promise<TextHit<T>[]>;
}
