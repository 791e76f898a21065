import { cacheControlFor, NO_STORE } from '../cacheHeaders';
import { ANONYMOUS, type Viewer } from '../../domain/entities/Viewer';

describe('cacheControlFor', () => {
  const signedIn: Viewer = { kind: 'principal', principalId: 'p1' };

  it('should let shared caches keep the anonymous listing for the TTL', () => {
    expect(cacheControlFor('listing', ANONYMOUS, 300)).toBe('public, max-age=300');
  });

  it('should forbid caching of a signed-in listing', () => {
    expect(cacheControlFor('listing', signedIn, 300)).toBe(NO_STORE);
  });

  it.each([ANONYMOUS, signedIn])('should forbid caching of search results for %j', (viewer) => {
    expect(cacheControlFor('search', viewer, 300)).toBe('no-cache, no-store, must-revalidate');
  });
});
