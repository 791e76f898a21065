/**
 * SQL utility functions for safe query construction.
 */

/**
 * Safe PostgreSQL identifier pattern.
 * Allows letters, digits, and underscores; must start with a letter or underscore.
 */
const SAFE_IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Validate a table, index or JSON field name before it is interpolated into SQL.
 * Values always go through placeholders; identifiers cannot.
 *
 * @throws Error if the name does not match [a-zA-Z_][a-zA-Z0-9_]*
 */
export function assertSafeIdentifier(name: string): string {
  if (!SAFE_IDENTIFIER_RE.test(name)) {
    throw new Error(
      `Unsafe SQL identifier '${name}'. ` +
      'Identifiers must match [a-zA-Z_][a-zA-Z0-9_]*.'
    );
  }
  return name;
}

/**
 * Sanitize a full-text query for plainto_tsquery
 * - Removes FTS operator characters
 * - Limits query length
 * - Normalizes whitespace
 * @returns Sanitized query, empty when nothing indexable remains
 */
export function sanitizeFtsQuery(query: string, maxLength = 200): string {
  return query
    .slice(0, maxLength)
    .replace(/[&|!():*<>'"\\]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
