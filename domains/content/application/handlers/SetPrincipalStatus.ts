import { getLogger } from '@kernel/logger';
import type { ReadThroughCache } from '@cache/readThroughCache';
import { getErrorMessage, toError } from '@errors';

import type { PrincipalFlags } from '../../domain/entities/Principal';
import type { PrincipalDirectory } from '../ports/PrincipalDirectory';

const logger = getLogger('SetPrincipalStatus');

export interface SetPrincipalStatusResult {
  success: boolean;
  error?: string;
}

/**
* Shared flow for principal flag changes. Visibility of any cached aggregate
* may depend on the principal, so a successful change clears the whole cache.
*/
abstract class PrincipalFlagHandler {
  constructor(
    protected readonly principals: PrincipalDirectory,
    protected readonly cache: ReadThroughCache
  ) {}

  protected async apply(principalId: string, flags: PrincipalFlags): Promise<SetPrincipalStatusResult> {
    if (!principalId) {
      return { success: false, error: 'Principal ID is required' };
    }

    let found: boolean;
    try {
      found = await this.principals.update(principalId, flags);
    } catch (error) {
      logger.error('Failed to update principal', toError(error), { principalId });
      return { success: false, error: getErrorMessage(error) };
    }

    if (!found) {
      return { success: false, error: `Principal with ID '${principalId}' not found` };
    }

    this.cache.invalidate({ kind: 'all' });
    logger.info('Principal flags changed', { principalId, ...flags });
    return { success: true };
  }
}

/**
* Command handler for activating or deactivating a principal.
*/
export class SetPrincipalActive extends PrincipalFlagHandler {
  execute(principalId: string, isActive: boolean): Promise<SetPrincipalStatusResult> {
    return this.apply(principalId, { isActive });
  }
}

/**
* Command handler for granting or revoking admin rights.
*/
export class SetPrincipalAdmin extends PrincipalFlagHandler {
  execute(principalId: string, isAdmin: boolean): Promise<SetPrincipalStatusResult> {
    return this.apply(principalId, { isAdmin });
  }
}
