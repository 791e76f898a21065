import { getLogger } from '@kernel/logger';
import { getErrorMessage, SearchUnavailableError, SuspiciousInputError, toError } from '@errors';
import { classifySearchInput, SUSPICIOUS_INPUT_RULES, type SuspicionRule } from '@security/suspicious-input';
import type { Post } from '@domain/content/domain/entities/Post';
import { SEARCHABLE_POST_FIELDS } from '@domain/content/domain/entities/Post';
import { isVisible } from '@domain/content/domain/visibility';
import type { TextHit, TextIndexedCollection } from '@domain/content/application/ports/TextIndexedCollection';
import type { PrincipalDirectory } from '@domain/content/application/ports/PrincipalDirectory';

import { NEUTRAL_SCORE, type SearchOutcome, type SearchRejection, type SearchResult } from '../domain/SearchResult';

const logger = getLogger('search:posts');

/**
* Escape regex metacharacters so user text matches literally
*/
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
* Full-text post search with a pattern-scan fallback.
*
* Flow per query:
* 1. Blank query: every visible post, unranked
* 2. Suspicious query: rejected before the store is touched
* 3. Index query, restricted to active authors and ranked by score
* 4. If the index throws: case-insensitive literal match over title,
*    subtitle and body, unranked
*/
export class PostSearchService {
  constructor(
    private readonly posts: TextIndexedCollection<Post>,
    private readonly principals: PrincipalDirectory,
    private readonly rules: readonly SuspicionRule[] = SUSPICIOUS_INPUT_RULES
  ) {}

  /**
  * Search posts by title, subtitle and body
  *
  * @param query - Raw search text, classified as given; trimmed for the index query
  * @param activePrincipals - Active principal IDs; read from the directory when omitted
  * @throws {SearchUnavailableError} when neither the index nor the fallback scan can run
  *
  * @example
  * ```typescript
  * const outcome = await search.search('ocean');
  * if (outcome.ok) {
  *   // outcome.results ranked when outcome.strategy === 'index'
  * }
  * ```
  */
  async search(
    query: string | null | undefined,
    activePrincipals?: ReadonlySet<string>
  ): Promise<SearchOutcome> {
    const text = query?.trim() ?? '';

    if (text !== '') {
      const rejection = this.screen(query ?? '');
      if (rejection) return rejection;
    }

    const active = activePrincipals ?? await this.principals.listActive();

    if (text === '') {
      return { ok: true, strategy: 'listing', results: await this.listVisible(active) };
    }

    let hits: TextHit<Post>[];
    try {
      hits = await this.posts.query(text);
    } catch (error) {
      logger.warn('Text index failed, falling back to pattern scan', { error: getErrorMessage(error) });
      return { ok: true, strategy: 'fallback', results: await this.scan(text, active) };
    }

    return { ok: true, strategy: 'index', results: rank(hits, active) };
  }

  /**
  * Classify raw search text without touching the store
  * @returns The rejection outcome for suspicious text, otherwise null
  */
  screen(query: string): SearchRejection | null {
    const verdict = classifySearchInput(query, this.rules);
    if (!verdict.isSuspicious) return null;

    logger.warn('Rejected suspicious search input', { category: verdict.category });
    return { ok: false, reason: 'suspicious-input', message: SuspiciousInputError.MESSAGE };
  }

  /**
  * Create the text indexes over the searchable fields
  */
  async ensureIndexes(): Promise<void> {
    for (const field of SEARCHABLE_POST_FIELDS) {
      await this.posts.createTextIndex(field);
    }
    logger.info('Text indexes ensured', { fields: [...SEARCHABLE_POST_FIELDS] });
  }

  /**
  * Rebuild the text indexes from stored posts
  * @throws {SearchUnavailableError} when a field cannot be reindexed
  */
  async rebuildIndexes(): Promise<void> {
    for (const field of SEARCHABLE_POST_FIELDS) {
      try {
        await this.posts.reindex(field);
      } catch (error) {
        logger.error('Failed to rebuild text index', toError(error), { field });
        throw new SearchUnavailableError({ cause: error });
      }
    }
    logger.info('Text indexes rebuilt', { fields: [...SEARCHABLE_POST_FIELDS] });
  }

  private async listVisible(active: ReadonlySet<string>): Promise<SearchResult[]> {
    const posts = await this.posts.find({ author: { $in: [...active] } });
    return posts.map(record => ({ record, relevanceScore: NEUTRAL_SCORE }));
  }

  private async scan(text: string, active: ReadonlySet<string>): Promise<SearchResult[]> {
    const pattern = new RegExp(escapeRegExp(text), 'i');

    let candidates: Post[];
    try {
      candidates = await this.posts.find({ author: { $in: [...active] } });
    } catch (error) {
      logger.error('Fallback scan failed', toError(error));
      throw new SearchUnavailableError({ cause: error });
    }

    return candidates
      .filter(post => SEARCHABLE_POST_FIELDS.some(field => pattern.test(post[field])))
      .map(record => ({ record, relevanceScore: NEUTRAL_SCORE }));
  }
}

/**
* Drop hits by inactive authors and order by score, best first.
* The sort is stable, so equal scores keep store order.
*/
function rank(hits: readonly TextHit<Post>[], active: ReadonlySet<string>): SearchResult[] {
  return hits
    .filter(hit => isVisible(hit.record, active))
    .map(hit => ({ record: hit.record, relevanceScore: hit.score }))
    .sort((a, b) => b.relevanceScore - a.relevanceScore);
}
