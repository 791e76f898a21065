/**
 * Test Mocks: Content Store
 *
 * Builds an in-memory ContentStore with text indexes on the searchable post
 * fields, plus factories for test documents.
 */

import type { ContentStore } from '@domain/content/application/container';
import type { Comment } from '@domain/content/domain/entities/Comment';
import { SEARCHABLE_POST_FIELDS, type Post } from '@domain/content/domain/entities/Post';
import type { Principal } from '@domain/content/domain/entities/Principal';

import { InMemoryDocumentCollection, InMemoryTextIndexedCollection } from './document-store';

export interface InMemoryContentStore extends ContentStore {
  posts: InMemoryTextIndexedCollection<Post>;
  comments: InMemoryDocumentCollection<Comment>;
  principals: InMemoryDocumentCollection<Principal>;
}

export interface ContentSeed {
  posts?: Post[];
  comments?: Comment[];
  principals?: Principal[];
}

export async function createInMemoryContentStore(seed: ContentSeed = {}): Promise<InMemoryContentStore> {
  const posts = new InMemoryTextIndexedCollection<Post>(seed.posts);
  for (const field of SEARCHABLE_POST_FIELDS) {
    await posts.createTextIndex(field);
  }
  return {
    posts,
    comments: new InMemoryDocumentCollection<Comment>(seed.comments),
    principals: new InMemoryDocumentCollection<Principal>(seed.principals),
  };
}

export function makePrincipal(id: string, overrides: Partial<Principal> = {}): Principal {
  return { id, name: `Principal ${id}`, isActive: true, isAdmin: false, ...overrides };
}

export function makePost(id: string, author: string, overrides: Partial<Post> = {}): Post {
  return {
    id,
    title: `Post ${id}`,
    subtitle: '',
    body: '',
    author,
    ...overrides,
  };
}

export function makeComment(id: string, postId: string, author: string, text = 'Nice post'): Comment {
  return { id, postId, author, text };
}
