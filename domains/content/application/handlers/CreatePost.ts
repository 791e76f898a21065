import { randomUUID } from 'crypto';

import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage, toError } from '@errors';

import type { Post } from '../../domain/entities/Post';
import type { DocumentCollection } from '../ports/DocumentCollection';
import { ReadOperations } from '../ContentReadService';
import { validatePostFields } from './validatePost';

const logger = getLogger('CreatePost');

export type NewPost = Omit<Post, 'id'>;

/**
* Result type for CreatePost command
*/
export interface CreatePostResult {
  success: boolean;
  post?: Post;
  error?: string;
}

/**
* Command handler for publishing a new post.
*
* A new post can appear in any listing or search result, so both namespaces
* are dropped once the insert succeeds.
*
* @throws Never throws - all errors are caught and returned in the result
*/
export class CreatePost {
  constructor(
    private readonly posts: DocumentCollection<Post>,
    private readonly cache: ReadThroughCache
  ) {}

  /**
  * @example
  * ```typescript
  * const result = await handler.execute({ title: 'Tides', subtitle: '', body: '...', author: 'p-1' });
  * if (result.success) {
  *   // result.post.id is the generated ID
  * }
  * ```
  */
  async execute(input: NewPost): Promise<CreatePostResult> {
    const validationError = validatePostFields(input);
    if (validationError) {
      return { success: false, error: validationError };
    }

    const post: Post = { ...input, id: randomUUID() };

    try {
      await this.posts.insert(post);
    } catch (error) {
      logger.error('Failed to create post', toError(error));
      return { success: false, error: getErrorMessage(error) };
    }

    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.LIST_POSTS });
    this.cache.invalidate({ kind: 'operation', operation: ReadOperations.SEARCH_POSTS });
    // A not-found view cached under this ID must not outlive the insert
    this.cache.invalidate({ kind: 'key', operation: ReadOperations.POST_WITH_COMMENTS, args: [post.id] });

    logger.info('Post created', { postId: post.id });
    return { success: true, post };
  }
}
