import type { Post } from '@domain/content/domain/entities/Post';

/**
* One search hit. Index hits carry the index score; fallback and listing
* hits score 0.
*/
export interface SearchResult {
  record: Post;
  relevanceScore: number;
}

/** How a successful outcome was produced */
export type SearchStrategy = 'index' | 'fallback' | 'listing';

export type SearchOutcome =
  | { ok: true; strategy: SearchStrategy; results: SearchResult[] }
  | { ok: false; reason: 'suspicious-input'; message: string };

export type SearchRejection = Extract<SearchOutcome, { ok: false }>;

export const NEUTRAL_SCORE = 0;
