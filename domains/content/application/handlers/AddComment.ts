import { randomUUID } from 'crypto';

import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage, toError } from '@errors';

import type { Comment } from '../../domain/entities/Comment';
import type { Post } from '../../domain/entities/Post';
import type { DocumentCollection } from '../ports/DocumentCollection';
import { ReadOperations } from '../ContentReadService';

const logger = getLogger('AddComment');

const MAX_COMMENT_LENGTH = 5000;

export interface AddCommentResult {
  success: boolean;
  comment?: Comment;
  error?: string;
}

/**
* Command handler for commenting on a post.
* Only the commented post's view can go stale.
*
* @throws Never throws - all errors are caught and returned in the result
*/
export class AddComment {
  constructor(
    private readonly posts: DocumentCollection<Post>,
    private readonly comments: DocumentCollection<Comment>,
    private readonly cache: ReadThroughCache
  ) {}

  async execute(postId: string, author: string, text: string): Promise<AddCommentResult> {
    if (!postId || !author) {
      return { success: false, error: 'Post ID and author are required' };
    }
    if (text.trim() === '') {
      return { success: false, error: 'Comment cannot be empty' };
    }
    if (text.length > MAX_COMMENT_LENGTH) {
      return { success: false, error: `Comment must be at most ${MAX_COMMENT_LENGTH} characters` };
    }

    const comment: Comment = { id: randomUUID(), postId, author, text };

    try {
      const post = await this.posts.findOne({ id: postId });
      if (!post) {
        return { success: false, error: `Post with ID '${postId}' not found` };
      }
      await this.comments.insert(comment);
    } catch (error) {
      logger.error('Failed to add comment', toError(error), { postId });
      return { success: false, error: getErrorMessage(error) };
    }

    this.cache.invalidate({ kind: 'key', operation: ReadOperations.POST_WITH_COMMENTS, args: [postId] });
    return { success: true, comment };
  }
}
