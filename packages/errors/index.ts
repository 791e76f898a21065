
import { getLogger } from '@kernel/logger';

const logger = getLogger('errors');

/**
* Unified Error Handling Package
*
* Standardized error classes, error codes, and response helpers shared by the
* read path, the search engine and the store adapters.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details (validation issues, etc.)
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  CONFIG_ERROR: 'CONFIG_ERROR',

  // Search Errors
  SEARCH_INDEX_ERROR: 'SEARCH_INDEX_ERROR',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape handed to the request layer.
 */
export interface ErrorResponse {
  error: string;
  code: string;
  /** Hidden outside development */
  details?: unknown;
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly requestId: string | undefined;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    statusCode: number = 500,
    details?: unknown,
    requestId: string | undefined = undefined,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.requestId = requestId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
      ...(this.requestId !== undefined && { requestId: this.requestId }),
    };
  }

  /**
  * Get sanitized version for client exposure.
  * details are only included in development.
  */
  toClientJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(shouldExposeErrorDetails() && this.details !== undefined && { details: this.details }),
      ...(this.requestId !== undefined && { requestId: this.requestId }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: unknown,
    requestId?: string
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, details, requestId);
  }
}

/**
* Raised when search text looks like a URL, markup, code or obfuscation.
* The message is deliberately generic; the matched rule never leaves the server.
*/
export class SuspiciousInputError extends AppError {
  static readonly MESSAGE = 'Invalid search query. Please use only text in search.';

  constructor(requestId?: string) {
    super(SuspiciousInputError.MESSAGE, ErrorCodes.INVALID_INPUT, 400, undefined, requestId);
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string = 'Invalid configuration',
    details?: unknown
  ) {
    super(message, ErrorCodes.CONFIG_ERROR, 500, details);
  }
}

/**
* The full-text index could not answer a query (untokenizable text, broken
* index). Callers recover by falling back to a pattern scan.
*/
export class SearchIndexError extends AppError {
  constructor(
    message: string = 'Search index could not service the query',
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.SEARCH_INDEX_ERROR, 500, undefined, undefined, options);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.SERVICE_UNAVAILABLE, 503, undefined, undefined, options);
  }
}

/**
* Neither the index nor the fallback scan could run.
*/
export class SearchUnavailableError extends ServiceUnavailableError {
  constructor(options?: { cause?: unknown }) {
    super('Search is temporarily unavailable', options);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
* Check if we should expose detailed error info
*/
export function shouldExposeErrorDetails(): boolean {
  return process.env['NODE_ENV'] === 'development';
}

/**
* Sanitize error for client response
* Logs the full error server-side and returns a shape safe to render
*/
export function sanitizeErrorForClient(error: unknown): ErrorResponse {
  logger.error('Internal error', toError(error));

  if (error instanceof AppError) {
    return error.toClientJSON();
  }

  return {
    error: 'An error occurred processing your request',
    code: ErrorCodes.INTERNAL_ERROR,
  };
}

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize an unknown catch parameter into an Error for logging.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
