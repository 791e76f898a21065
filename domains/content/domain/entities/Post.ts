/**
* Post Domain Entity
*
* A published blog post. The `author` field holds the owning principal's ID;
* the post is visible only while that principal is active.
*
* @module domains/content/domain/entities/Post
*/

export interface Post {
  id: string;
  title: string;
  subtitle: string;
  body: string;
  /** Principal ID of the owner */
  author: string;
  imgUrl?: string | undefined;
  /** Display date as entered, e.g. "March 3, 2024" */
  date?: string | undefined;
}

/** Fields covered by the full-text index */
export const SEARCHABLE_POST_FIELDS = ['title', 'subtitle', 'body'] as const;

export type SearchablePostField = typeof SEARCHABLE_POST_FIELDS[number];
