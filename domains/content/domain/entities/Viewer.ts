/**
* Who is reading. Only anonymous reads are shared through the cache.
*/
export type Viewer =
  | { kind: 'anonymous' }
  | { kind: 'principal'; principalId: string };

export const ANONYMOUS: Viewer = { kind: 'anonymous' };

export function isAnonymous(viewer: Viewer): boolean {
  return viewer.kind === 'anonymous';
}
