/**
* Visibility Filter
*
* A record is visible iff its owning principal is in the active set.
*/

export interface Owned {
  author: string;
}

export function isVisible(record: Owned, activePrincipals: ReadonlySet<string>): boolean {
  return activePrincipals.has(record.author);
}

/**
* Keep only records owned by an active principal, in their original order
*/
export function filterVisible<T extends Owned>(
  records: readonly T[],
  activePrincipals: ReadonlySet<string>
): T[] {
  return records.filter(record => isVisible(record, activePrincipals));
}
