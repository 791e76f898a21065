/**
* Document store contract consumed by the read path and the search engine.
*
* Filters are conjunctions of field conditions. A condition is either a value
* (equality) or `{ $in: values }` (membership); an empty `$in` matches nothing.
*
* @throws Implementations propagate store failures unchanged
*/

export interface StoredDocument {
  id: string;
}

export type FieldCondition<V> = V | { $in: readonly V[] };

export type DocumentFilter<T> = {
  [K in keyof T]?: FieldCondition<T[K]>;
};

export type DocumentPatch<T extends StoredDocument> = Partial<Omit<T, 'id'>>;

export interface DocumentCollection<T extends StoredDocument> {
  /**
  * Find every matching document in store (insertion) order
  */
  find(filter?: DocumentFilter<T>): Promise<T[]>;

  findOne(filter: DocumentFilter<T>): Promise<T | null>;

  insert(doc: T): Promise<void>;

  /**
  * Apply a shallow patch to every matching document
  * @returns Number of documents updated
  */
  update(filter: DocumentFilter<T>, patch: DocumentPatch<T>): Promise<number>;

  /**
  * @returns Number of documents deleted
  */
  delete(filter: DocumentFilter<T>): Promise<number>;
}
