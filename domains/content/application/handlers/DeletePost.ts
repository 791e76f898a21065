import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage, toError } from '@errors';

import type { Comment } from '../../domain/entities/Comment';
import type { Post } from '../../domain/entities/Post';
import type { DocumentCollection } from '../ports/DocumentCollection';
import { ReadOperations } from '../ContentReadService';

const logger = getLogger('DeletePost');

export interface DeletePostResult {
  success: boolean;
  /** Comments removed along with the post */
  deletedComments?: number;
  error?: string;
}

/**
* Command handler for deleting a post together with its comments.
*
* @throws Never throws - all errors are caught and returned in the result
*/
export class DeletePost {
  constructor(
    private readonly posts: DocumentCollection<Post>,
    private readonly comments: DocumentCollection<Comment>,
    private readonly cache: ReadThroughCache
  ) {}

  async execute(postId: string): Promise<DeletePostResult> {
    if (!postId) {
      return { success: false, error: 'Post ID is required' };
    }

    let deleted: number;
    try {
      deleted = await this.posts.delete({ id: postId });
    } catch (error) {
      logger.error('Failed to delete post', toError(error), { postId });
      return { success: false, error: getErrorMessage(error) };
    }

    if (deleted === 0) {
      return { success: false, error: `Post with ID '${postId}' not found` };
    }

    this.cache.invalidate({ kind: 'key', operation: ReadOperations.POST_WITH_COMMENTS, args: [postId] });
    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.LIST_POSTS });
    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.SEARCH_POSTS });

    let deletedComments: number;
    try {
      deletedComments = await this.comments.delete({ postId });
    } catch (error) {
      logger.error('Post deleted but its comments were not', toError(error), { postId });
      return { success: false, error: getErrorMessage(error) };
    }

    logger.info('Post deleted', { postId, deletedComments });
    return { success: true, deletedComments };
  }
}
