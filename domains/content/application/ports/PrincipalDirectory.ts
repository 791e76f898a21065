import type { Principal, PrincipalFlags } from '../../domain/entities/Principal';

/**
* Repository interface for principal lookups and status changes.
*/
export interface PrincipalDirectory {
  /**
  * IDs of every active principal, read fresh on each call
  */
  listActive(): Promise<ReadonlySet<string>>;

  findById(id: string): Promise<Principal | null>;

  /**
  * @returns false when no principal has the ID
  */
  update(id: string, flags: PrincipalFlags): Promise<boolean>;
}
