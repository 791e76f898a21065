/**
 * Structured Logger Tests
 */

import { addLogHandler, getLogger, type LogEntry } from '../logger';
import { createRequestContext, runWithContext } from '../request-context';

describe('Logger', () => {
  let entries: LogEntry[];
  let remove: () => void;
  const originalLevel = process.env['LOG_LEVEL'];

  beforeEach(() => {
    entries = [];
    remove = addLogHandler(entry => entries.push(entry));
  });

  afterEach(() => {
    remove();
    if (originalLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLevel;
    }
  });

  it('should prefix the message with the service name', () => {
    getLogger('cache').info('Cache sweep', { removedEntries: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: '[cache] Cache sweep',
      service: 'cache',
      metadata: { removedEntries: 2 },
    });
  });

  it('should attach error message and stack', () => {
    const failure = new Error('connection reset');

    getLogger('database:documents').error('Failed to find documents', failure, { table: 'blog_posts' });

    expect(entries[0]?.error).toBe(failure);
    expect(entries[0]?.errorMessage).toBe('connection reset');
    expect(entries[0]?.errorStack).toBe(failure.stack);
  });

  it('should drop entries below the configured level', () => {
    process.env['LOG_LEVEL'] = 'warn';
    const logger = getLogger('search:posts');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(entries.map(entry => entry.level)).toEqual(['warn']);
  });

  it('should emit nothing when silenced', () => {
    process.env['LOG_LEVEL'] = 'silent';

    getLogger('search:posts').fatal('hidden');

    expect(entries).toEqual([]);
  });

  it('should merge child context into metadata', () => {
    getLogger({ service: 'content:read', context: { region: 'eu' } })
      .child({ operation: 'listPosts' })
      .debug('Cache miss', { attempt: 1 });

    expect(entries[0]?.metadata).toEqual({ region: 'eu', operation: 'listPosts', attempt: 1 });
  });

  it('should stop delivering to a removed handler', () => {
    remove();

    getLogger('cache').warn('after removal');

    expect(entries).toEqual([]);
  });

  it('should carry the request context into entries', async () => {
    const context = createRequestContext({ requestId: 'req-7', principalId: 'p1' });

    await runWithContext(context, async () => {
      getLogger('content:read').info('inside request');
    });
    getLogger('content:read').info('outside request');

    expect(entries[0]?.requestId).toBe('req-7');
    expect(entries[0]?.principalId).toBe('p1');
    expect(entries[1]?.requestId).toBeUndefined();
  });

  it('should prefer an explicit correlation ID', async () => {
    await runWithContext(createRequestContext({ requestId: 'req-8' }), async () => {
      getLogger({ service: 'jobs', correlationId: 'corr-1' }).info('tagged');
    });

    expect(entries[0]?.requestId).toBe('corr-1');
  });
});
