import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage } from '@errors';
import type { PostSearchService } from '@domain/search/application/PostSearchService';

import { ReadOperations } from '../ContentReadService';

const logger = getLogger('RebuildSearchIndexes');

export interface RebuildSearchIndexesResult {
  success: boolean;
  error?: string;
}

/**
* Admin command that rebuilds the post text indexes and drops cached searches.
*
* @throws Never throws - all errors are caught and returned in the result
*/
export class RebuildSearchIndexes {
  constructor(
    private readonly search: PostSearchService,
    private readonly cache: ReadThroughCache
  ) {}

  async execute(): Promise<RebuildSearchIndexesResult> {
    try {
      await this.search.rebuildIndexes();
    } catch (error) {
      return { success: false, error: getErrorMessage(error) };
    }

    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.SEARCH_POSTS });
    logger.info('Search indexes rebuilt');
    return { success: true };
  }
}
