/**
 * @fileOverview: Unit tests for the ErrorHandler utility
 * @module: ErrorHandler Tests
 * @description: Error classes, classification of thrown values and user-facing messages
 */

import {
  ConfigurationError,
  ErrorCode,
  ErrorHandler,
  NamingAssistantError,
  PipelineError,
  SearchServiceError,
  ValidationError,
  createError,
  getUserFriendlyMessage,
  handleError,
  toErrorMessage,
} from '../errorHandler';

// Mock logger
jest.mock('../logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
  },
}));

import { logger } from '../logger';

describe('ErrorHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('Custom Error Classes', () => {
    test('NamingAssistantError should include code and details', () => {
      const error = new NamingAssistantError(ErrorCode.API_ERROR, 'Test error', { field: 'test' }, { requestId: 'r-1' });

      expect(error.code).toBe(ErrorCode.API_ERROR);
      expect(error.message).toBe('Test error');
      expect(error.details).toEqual({ field: 'test' });
      expect(error.context).toEqual({ requestId: 'r-1' });
      expect(error.name).toBe('NamingAssistantError');
    });

    test('ValidationError should include field information', () => {
      const error = new ValidationError('request', 'Request text is required');

      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.message).toBe('Validation error for request: Request text is required');
      expect(error.details).toEqual({ field: 'request' });
      expect(error).toBeInstanceOf(NamingAssistantError);
    });

    test('ConfigurationError should list the offending fields', () => {
      const error = new ConfigurationError(
        ErrorCode.MISSING_CONFIG,
        'Missing required configuration: SEARCH_ENDPOINT',
        ['SEARCH_ENDPOINT']
      );

      expect(error.name).toBe('ConfigurationError');
      expect(error.details).toEqual({ fields: ['SEARCH_ENDPOINT'] });
    });

    test.each([
      [401, ErrorCode.AUTH_ERROR],
      [403, ErrorCode.AUTH_ERROR],
      [429, ErrorCode.RATE_LIMIT_ERROR],
      [503, ErrorCode.SEARCH_FAILED],
      [undefined, ErrorCode.NETWORK_ERROR],
    ])('SearchServiceError maps status %p to %s', (status, code) => {
      const error = new SearchServiceError('Search API Error', status);

      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(status);
    });

    test('PipelineError keeps the code of a known cause', () => {
      const error = new PipelineError('idle', new ValidationError('file.name', 'Unsupported file type: a.png'));

      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.state).toBe('idle');
      expect(error.message).toBe('Request failed while idle: Validation error for file.name: Unsupported file type: a.png');
    });

    test('PipelineError falls back to PIPELINE_FAILED', () => {
      const error = new PipelineError('searching', 'socket hang up');

      expect(error.code).toBe(ErrorCode.PIPELINE_FAILED);
      expect(error.details).toEqual({ state: 'searching', reason: 'socket hang up' });
    });
  });

  describe('createError', () => {
    test('should keep structured errors as they are', () => {
      const original = new ValidationError('limit', 'Too big', { tool: 'naming_history' });
      const result = createError(original, { surface: 'mcp' });

      expect(result.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.message).toBe('Validation error for limit: Too big');
      expect(result.originalError).toBe(original);
      expect(result.context).toEqual({ tool: 'naming_history', surface: 'mcp' });
    });

    test.each([
      ['Request timed out.', ErrorCode.AI_TIMEOUT_ERROR, 'Operation timed out'],
      ['429 Rate limit reached', ErrorCode.RATE_LIMIT_ERROR, 'Rate limit exceeded, please try again later'],
      ['401 Unauthorized', ErrorCode.AUTH_ERROR, 'Authentication with an external service failed'],
      ['connect ECONNREFUSED 127.0.0.1:443', ErrorCode.NETWORK_ERROR, 'Network connection failed'],
      ['Something odd', ErrorCode.INTERNAL_ERROR, 'An internal error occurred'],
    ])('should classify "%s"', (message, code, text) => {
      const result = createError(new Error(message));

      expect(result.code).toBe(code);
      expect(result.message).toBe(text);
      expect(result.details).toEqual({ originalError: message });
    });

    test('should handle non-Error values', () => {
      const result = createError('plain string');

      expect(result.code).toBe(ErrorCode.UNKNOWN_ERROR);
      expect(result.message).toBe('An unknown error occurred');
      expect(result.details).toEqual({ error: 'plain string' });
    });
  });

  describe('handleError', () => {
    test('should log at error level by default', () => {
      const result = handleError(new Error('boom'), { operation: 'ask' });

      expect(result.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(logger.error).toHaveBeenCalledWith('An internal error occurred', {
        code: ErrorCode.INTERNAL_ERROR,
        operation: 'ask',
        originalError: 'boom',
      });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test('should log at warn level on request', () => {
      ErrorHandler.handleError(new ValidationError('request', 'Request text is required'), undefined, 'warn');

      expect(logger.warn).toHaveBeenCalledWith('Validation error for request: Request text is required', {
        code: ErrorCode.VALIDATION_ERROR,
        field: 'request',
      });
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('getUserFriendlyMessage', () => {
    test('should pass validation messages through', () => {
      const structured = createError(new ValidationError('fileName', 'File name is required'));
      expect(getUserFriendlyMessage(structured)).toBe('Validation error for fileName: File name is required');
    });

    test('should describe configuration problems', () => {
      const structured = createError(new ConfigurationError(ErrorCode.INVALID_CONFIG, 'Invalid configuration', []));
      expect(getUserFriendlyMessage(structured)).toBe('Please check your configuration and environment variables.');
    });

    test('should describe search authentication failures', () => {
      const structured = createError(new SearchServiceError('Search API Error 403: forbidden', 403));
      expect(getUserFriendlyMessage(structured)).toBe('An external service rejected the configured credentials.');
    });

    test('should fall back to a generic message', () => {
      const structured = createError(new PipelineError('generating', new Error('history unavailable')));
      expect(getUserFriendlyMessage(structured)).toBe(
        'An unexpected error occurred while processing the request. Please try again.'
      );
    });
  });

  test('toErrorMessage should stringify non-Error values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage(42)).toBe('42');
  });
});
