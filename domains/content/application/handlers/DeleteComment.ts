import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage, toError } from '@errors';

import type { Comment } from '../../domain/entities/Comment';
import type { DocumentCollection } from '../ports/DocumentCollection';
import { ReadOperations } from '../ContentReadService';

const logger = getLogger('DeleteComment');

export interface DeleteCommentResult {
  success: boolean;
  error?: string;
}

/**
* Command handler for removing a comment.
*
* @throws Never throws - all errors are caught and returned in the result
*/
export class DeleteComment {
  constructor(
    private readonly comments: DocumentCollection<Comment>,
    private readonly cache: ReadThroughCache
  ) {}

  async execute(commentId: string): Promise<DeleteCommentResult> {
    if (!commentId) {
      return { success: false, error: 'Comment ID is required' };
    }

    let comment: Comment | null;
    try {
      comment = await this.comments.findOne({ id: commentId });
      if (!comment) {
        return { success: false, error: `Comment with ID '${commentId}' not found` };
      }
      await this.comments.delete({ id: commentId });
    } catch (error) {
      logger.error('Failed to delete comment', toError(error), { commentId });
      return { success: false, error: getErrorMessage(error) };
    }

    this.cache.invalidate({ kind: 'key', operation: ReadOperations.POST_WITH_COMMENTS, args: [comment.postId] });
    return { success: true };
  }
}
