import { z } from 'zod';

/**
* Schemas for documents read back from the store
*/

export const postSchema = z.object({
  id: z.string(),
  title: z.string(),
  subtitle: z.string(),
  body: z.string(),
  author: z.string(),
  imgUrl: z.string().optional(),
  date: z.string().optional(),
});

export const commentSchema = z.object({
  id: z.string(),
  postId: z.string(),
  author: z.string(),
  text: z.string(),
});

export const principalSchema = z.object({
  id: z.string(),
  name: z.string(),
  isActive: z.boolean(),
  isAdmin: z.boolean(),
});

/** Table names of the content collections */
export const ContentTables = {
  POSTS: 'blog_posts',
  COMMENTS: 'blog_comments',
  PRINCIPALS: 'principals',
} as const;
