import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Carries the request ID and the signed-in principal across async calls
* so log lines emitted deep inside the read path can be correlated.
*/

export interface RequestContext {
  requestId: string;
  /** Principal ID of the signed-in viewer, absent for anonymous requests */
  principalId?: string | undefined;
  startTime: number;
  path?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
* @param context - Request context to use
* @param fn - Function to execute
*/
export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
* Generate new request context
* @param options - Optional context properties to override defaults
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    principalId: options?.principalId,
    startTime: options?.startTime ?? Date.now(),
    path: options?.path,
  };
}

