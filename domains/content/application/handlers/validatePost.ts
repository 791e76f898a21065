import type { Post } from '../../domain/entities/Post';

const MAX_TITLE_LENGTH = 250;
// 1MB
const MAX_BODY_BYTES = 1024 * 1024;

/**
* Validates post fields present in the input
* @returns Error message if validation fails, undefined otherwise
*/
export function validatePostFields(fields: Partial<Post>): string | undefined {
  if (fields.title !== undefined) {
    if (fields.title.trim() === '') {
      return 'Title cannot be empty';
    }
    if (fields.title.length > MAX_TITLE_LENGTH) {
      return `Title must be at most ${MAX_TITLE_LENGTH} characters`;
    }
  }
  if (fields.body !== undefined && Buffer.byteLength(fields.body, 'utf8') > MAX_BODY_BYTES) {
    return 'Body content exceeds maximum size of 1MB';
  }
  if (fields.author !== undefined && fields.author.trim() === '') {
    return 'Author is required';
  }
  return undefined;
}
