/**
 * Error Handling Package Tests
 *
 * AppError hierarchy, codes, status mapping, serialization and the helpers
 * used in catch blocks.
 */

import {
  AppError,
  ConfigError,
  ErrorCodes,
  getErrorMessage,
  sanitizeErrorForClient,
  SearchIndexError,
  SearchUnavailableError,
  ServiceUnavailableError,
  SuspiciousInputError,
  toError,
  ValidationError,
} from '../index';

describe('Error Handling Package', () => {
  const originalNodeEnv = process.env['NODE_ENV'];

  afterEach(() => {
    process.env['NODE_ENV'] = originalNodeEnv;
  });

  describe('AppError', () => {
    it('should default to an internal error', () => {
      const error = new AppError('boom');

      expect(error.code).toBe(ErrorCodes.INTERNAL_ERROR);
      expect(error.statusCode).toBe(500);
      expect(error.name).toBe('AppError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should serialize details and request ID', () => {
      const error = new ValidationError('Bad field', { field: 'title' }, 'req-1');

      expect(error.toJSON()).toEqual({
        error: 'Bad field',
        code: 'VALIDATION_ERROR',
        details: { field: 'title' },
        requestId: 'req-1',
      });
    });

    it('should hide details from clients outside development', () => {
      process.env['NODE_ENV'] = 'production';
      const error = new ConfigError('Invalid configuration', [{ path: ['CACHE_TIMEOUT'] }]);

      expect(error.toClientJSON()).toEqual({ error: 'Invalid configuration', code: 'CONFIG_ERROR' });
    });

    it('should show details to clients in development', () => {
      process.env['NODE_ENV'] = 'development';
      const error = new ConfigError('Invalid configuration', ['CACHE_TIMEOUT']);

      expect(error.toClientJSON().details).toEqual(['CACHE_TIMEOUT']);
    });
  });

  describe('search errors', () => {
    it('should give suspicious input a fixed message', () => {
      const error = new SuspiciousInputError();

      expect(error.message).toBe('Invalid search query. Please use only text in search.');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('INVALID_INPUT');
    });

    it('should keep the cause of an index failure', () => {
      const cause = new Error('tsquery syntax');
      const error = new SearchIndexError('Text query failed', { cause });

      expect(error.cause).toBe(cause);
      expect(error.code).toBe('SEARCH_INDEX_ERROR');
    });

    it('should report unavailability as 503', () => {
      const error = new SearchUnavailableError({ cause: new Error('down') });

      expect(error).toBeInstanceOf(ServiceUnavailableError);
      expect(error.statusCode).toBe(503);
      expect(error.code).toBe('SERVICE_UNAVAILABLE');
      expect(error.message).toBe('Search is temporarily unavailable');
    });

    it('should not set a cause when none is given', () => {
      expect('cause' in new SearchIndexError()).toBe(false);
    });
  });

  describe('sanitizeErrorForClient', () => {
    it('should expose the message of an AppError', () => {
      expect(sanitizeErrorForClient(new SearchUnavailableError())).toEqual({
        error: 'Search is temporarily unavailable',
        code: 'SERVICE_UNAVAILABLE',
      });
    });

    it('should hide the message of any other error', () => {
      expect(sanitizeErrorForClient(new Error('password=test-secret'))).toEqual({
        error: 'An error occurred processing your request',
        code: 'INTERNAL_ERROR',
      });
    });
  });

  describe('helpers', () => {
    it('should read a message from anything thrown', () => {
      expect(getErrorMessage(new Error('nope'))).toBe('nope');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage(42)).toBe('42');
    });

    it('should wrap non-errors', () => {
      const original = new Error('kept');

      expect(toError(original)).toBe(original);
      expect(toError('wrapped').message).toBe('wrapped');
    });
  });
});
