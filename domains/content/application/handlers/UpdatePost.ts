import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage, toError } from '@errors';

import type { Post } from '../../domain/entities/Post';
import type { DocumentCollection } from '../ports/DocumentCollection';
import { ReadOperations } from '../ContentReadService';
import { validatePostFields } from './validatePost';

const logger = getLogger('UpdatePost');

export type PostChanges = Partial<Pick<Post, 'title' | 'subtitle' | 'body' | 'imgUrl'>>;

export interface UpdatePostResult {
  success: boolean;
  error?: string;
}

/**
* Command handler for editing a post.
*
* Drops the post's own view plus every listing and search result, since any
* of them may show the old text.
*
* @throws Never throws - all errors are caught and returned in the result
*/
export class UpdatePost {
  constructor(
    private readonly posts: DocumentCollection<Post>,
    private readonly cache: ReadThroughCache
  ) {}

  async execute(postId: string, changes: PostChanges): Promise<UpdatePostResult> {
    if (!postId) {
      return { success: false, error: 'Post ID is required' };
    }
    const validationError = validatePostFields(changes);
    if (validationError) {
      return { success: false, error: validationError };
    }

    let updated: number;
    try {
      updated = await this.posts.update({ id: postId }, changes);
    } catch (error) {
      logger.error('Failed to update post', toError(error), { postId });
      return { success: false, error: getErrorMessage(error) };
    }

    if (updated === 0) {
      return { success: false, error: `Post with ID '${postId}' not found` };
    }

    this.cache.invalidate({ kind: 'key', operation: ReadOperations.POST_WITH_COMMENTS, args: [postId] });
    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.LIST_POSTS });
    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.SEARCH_POSTS });

    return { success: true };
  }
}
