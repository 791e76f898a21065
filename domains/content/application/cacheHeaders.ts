import { isAnonymous, type Viewer } from '../domain/entities/Viewer';

export type CacheableView = 'listing' | 'search';

export const NO_STORE = 'no-cache, no-store, must-revalidate';

/**
* Cache-Control value for a rendered view.
* Only the anonymous listing may be cached by browsers and proxies.
*/
export function cacheControlFor(view: CacheableView, viewer: Viewer, ttlSeconds: number): string {
  if (view === 'listing' && isAnonymous(viewer)) {
    return `public, max-age=${ttlSeconds}`;
  }
  return NO_STORE;
}
