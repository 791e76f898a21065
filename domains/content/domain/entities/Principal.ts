/**
* Principal Domain Entity
*
* An account whose active flag gates the visibility of everything it authored.
* Deactivation hides content without deleting it.
*/
export interface Principal {
  id: string;
  name: string;
  isActive: boolean;
  isAdmin: boolean;
}

export type PrincipalFlags = Partial<Pick<Principal, 'isActive' | 'isAdmin'>>;
