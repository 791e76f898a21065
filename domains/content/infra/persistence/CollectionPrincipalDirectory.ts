import type { Principal, PrincipalFlags } from '../../domain/entities/Principal';
import type { DocumentCollection } from '../../application/ports/DocumentCollection';
import type { PrincipalDirectory } from '../../application/ports/PrincipalDirectory';

/**
* PrincipalDirectory over a principals document collection.
*/
export class CollectionPrincipalDirectory implements PrincipalDirectory {
  constructor(private readonly principals: DocumentCollection<Principal>) {}

  async listActive(): Promise<ReadonlySet<string>> {
    const active = await this.principals.find({ isActive: true });
    return new Set(active.map(principal => principal.id));
  }

  findById(id: string): Promise<Principal | null> {
    return this.principals.findOne({ id });
  }

  async update(id: string, flags: PrincipalFlags): Promise<boolean> {
    const updated = await this.principals.update({ id }, flags);
    return updated > 0;
  }
}
