import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import type { PostSearchService } from '@domain/search/application/PostSearchService';
import type { SearchOutcome } from '@domain/search/domain/SearchResult';

import type { Comment } from '../domain/entities/Comment';
import type { Post } from '../domain/entities/Post';
import { isAnonymous, type Viewer } from '../domain/entities/Viewer';
import { filterVisible } from '../domain/visibility';
import type { DocumentCollection } from './ports/DocumentCollection';
import type { PrincipalDirectory } from './ports/PrincipalDirectory';

const logger = getLogger('content:read');

/**
* Cached read operations; each name is also its invalidation namespace
*/
export const ReadOperations = {
  POST_WITH_COMMENTS: 'getPostWithComments',
  LIST_POSTS: 'listPosts',
  SEARCH_POSTS: 'searchPosts',
} as const;

export type PostView =
  | { status: 'found'; post: Post; comments: Comment[] }
  | { status: 'not-found' }
  /** The post exists but its author is deactivated */
  | { status: 'unavailable' };

/**
* Read path for posts, comments and search.
*
* Aggregations run through the read-through cache. Listing and search are
* shared only between anonymous viewers; signed-in viewers always read fresh.
*/
export class ContentReadService {
  constructor(
    private readonly cache: ReadThroughCache,
    private readonly posts: DocumentCollection<Post>,
    private readonly comments: DocumentCollection<Comment>,
    private readonly principals: PrincipalDirectory,
    private readonly search: PostSearchService
  ) {}

  /**
  * A post with the comments of active principals
  */
  getPostWithComments(postId: string): Promise<PostView> {
    return this.cache.cachedAggregate(
      ReadOperations.POST_WITH_COMMENTS,
      [postId],
      () => this.loadPostWithComments(postId)
    );
  }

  /**
  * Every post by an active author, in store order
  */
  listPosts(viewer: Viewer): Promise<Post[]> {
    if (!isAnonymous(viewer)) {
      return this.loadVisiblePosts();
    }
    return this.cache.cachedAggregate(ReadOperations.LIST_POSTS, [], () => this.loadVisiblePosts());
  }

  /**
  * Search posts. Successful anonymous searches are cached by their trimmed text;
  * the raw text is screened before the cache is consulted.
  */
  async searchPosts(query: string, viewer: Viewer): Promise<SearchOutcome> {
    if (!isAnonymous(viewer)) {
      return this.search.search(query);
    }

    const rejection = this.search.screen(query);
    if (rejection) return rejection;

    return this.cache.cachedAggregate(
      ReadOperations.SEARCH_POSTS,
      [query.trim()],
      () => this.search.search(query),
      { cacheIf: outcome => outcome.ok }
    );
  }

  private async loadPostWithComments(postId: string): Promise<PostView> {
    const post = await this.posts.findOne({ id: postId });
    if (!post) {
      return { status: 'not-found' };
    }

    const active = await this.principals.listActive();
    if (!active.has(post.author)) {
      logger.debug('Post hidden because its author is inactive', { postId });
      return { status: 'unavailable' };
    }

    const comments = filterVisible(await this.comments.find({ postId }), active);
    return { status: 'found', post, comments };
  }

  private async loadVisiblePosts(): Promise<Post[]> {
    const active = await this.principals.listActive();
    return this.posts.find({ author: { $in: [...active] } });
  }
}
