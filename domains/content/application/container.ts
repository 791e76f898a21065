import type { Pool } from 'pg';

import { getLogger } from '@kernel/logger';
import { ReadThroughCache, TtlCache } from '@cache';
import type { CacheConfig, ReadPathConfig } from '@config';
import {
  createPool,
  PostgresDocumentCollection,
  PostgresTextIndexedCollection,
  type Queryable,
} from '@database/index';
import { PostSearchService } from '@domain/search/application/PostSearchService';

import type { Comment } from '../domain/entities/Comment';
import type { Post } from '../domain/entities/Post';
import type { Principal } from '../domain/entities/Principal';
import { CollectionPrincipalDirectory } from '../infra/persistence/CollectionPrincipalDirectory';
import { commentSchema, ContentTables, postSchema, principalSchema } from '../infra/persistence/schemas';
import { ContentReadService } from './ContentReadService';
import { AddComment } from './handlers/AddComment';
import { CreatePost } from './handlers/CreatePost';
import { DeleteComment } from './handlers/DeleteComment';
import { DeletePost } from './handlers/DeletePost';
import { RebuildSearchIndexes } from './handlers/RebuildSearchIndexes';
import { SetPrincipalActive, SetPrincipalAdmin } from './handlers/SetPrincipalStatus';
import { UpdatePost } from './handlers/UpdatePost';
import type { DocumentCollection } from './ports/DocumentCollection';
import type { PrincipalDirectory } from './ports/PrincipalDirectory';
import type { TextIndexedCollection } from './ports/TextIndexedCollection';

const logger = getLogger('ContentContainer');

/**
* Collections the content services read and write
*/
export interface ContentStore {
  posts: TextIndexedCollection<Post>;
  comments: DocumentCollection<Comment>;
  principals: DocumentCollection<Principal>;
}

export interface ContentContainerConfig {
  cache: CacheConfig;
  store: ContentStore;
  /** Clock for the cache, epoch milliseconds */
  now?: (() => number) | undefined;
}

/**
* Dependency wiring for the read path, search and write handlers.
*
* Owns the one cache instance; every service and handler built here shares it,
* so a handler's invalidation is seen by every reader.
*/
export class ContentContainer {
  readonly cache: ReadThroughCache;
  readonly principals: PrincipalDirectory;
  readonly search: PostSearchService;
  readonly reads: ContentReadService;

  constructor(private readonly config: ContentContainerConfig) {
    const { cache, store } = config;

    this.cache = new ReadThroughCache(
      new TtlCache({
        ttlMs: cache.ttlSeconds * 1000,
        maxEntries: cache.maxEntries,
        enabled: cache.globalCacheEnabled,
        now: config.now,
      }),
      { sweepIntervalMs: cache.sweepIntervalMs }
    );
    this.principals = new CollectionPrincipalDirectory(store.principals);
    this.search = new PostSearchService(store.posts, this.principals);
    this.reads = new ContentReadService(this.cache, store.posts, store.comments, this.principals, this.search);

    logger.info('Content services wired', {
      cacheEnabled: cache.globalCacheEnabled,
      cacheTtlSeconds: cache.ttlSeconds,
    });
  }

  private get store(): ContentStore {
    return this.config.store;
  }

  get cacheTtlSeconds(): number {
    return this.config.cache.ttlSeconds;
  }

  createPost(): CreatePost {
    return new CreatePost(this.store.posts, this.cache);
  }

  updatePost(): UpdatePost {
    return new UpdatePost(this.store.posts, this.cache);
  }

  deletePost(): DeletePost {
    return new DeletePost(this.store.posts, this.store.comments, this.cache);
  }

  addComment(): AddComment {
    return new AddComment(this.store.posts, this.store.comments, this.cache);
  }

  deleteComment(): DeleteComment {
    return new DeleteComment(this.store.comments, this.cache);
  }

  setPrincipalActive(): SetPrincipalActive {
    return new SetPrincipalActive(this.principals, this.cache);
  }

  setPrincipalAdmin(): SetPrincipalAdmin {
    return new SetPrincipalAdmin(this.principals, this.cache);
  }

  rebuildSearchIndexes(): RebuildSearchIndexes {
    return new RebuildSearchIndexes(this.search, this.cache);
  }
}

/**
* PostgreSQL-backed content collections
*/
export function createPostgresContentStore(pool: Queryable): ContentStore & { ensureTables(): Promise<void> } {
  const posts = new PostgresTextIndexedCollection<Post>(pool, ContentTables.POSTS, postSchema);
  const comments = new PostgresDocumentCollection<Comment>(pool, ContentTables.COMMENTS, commentSchema);
  const principals = new PostgresDocumentCollection<Principal>(pool, ContentTables.PRINCIPALS, principalSchema);

  return {
    posts,
    comments,
    principals,
    async ensureTables(): Promise<void> {
      await posts.ensureTable();
      await comments.ensureTable();
      await principals.ensureTable();
    },
  };
}

/**
* Build the content services against PostgreSQL: open the pool, create
* tables and text indexes, then wire the container.
*
* @example
* ```typescript
* const { container, pool } = await bootstrapContent(loadReadPathConfig());
* const listing = await container.reads.listPosts(ANONYMOUS);
* await pool.end();
* ```
*/
export async function bootstrapContent(
  config: ReadPathConfig
): Promise<{ container: ContentContainer; pool: Pool }> {
  const pool = createPool(config.databaseUrl);
  try {
    const store = createPostgresContentStore(pool);
    await store.ensureTables();

    const container = new ContentContainer({ cache: config.cache, store });
    await container.search.ensureIndexes();
    return { container, pool };
  } catch (error) {
    await pool.end();
    throw error;
  }
}
