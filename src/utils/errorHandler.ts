/**
 * @fileOverview: Centralized error types and classification for the naming assistant
 * @module: ErrorHandler
 * @keyFunctions:
 *   - createError(): Classify any thrown value into a structured record
 *   - getUserFriendlyMessage(): Map an error code to user-facing text
 *   - toErrorMessage(): Extract a message string from an unknown value
 * @dependencies:
 *   - logger: Error logging for handleError()
 * @context: Components below the orchestrator degrade instead of throwing; these types describe what does get thrown (configuration, validation and orchestration failures) and how surfaces report it
 */

import { logger } from './logger';
import type { PipelineState } from '../pipeline/types';

export enum ErrorCode {
  // Configuration errors
  MISSING_CONFIG = 'MISSING_CONFIG',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Input errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',

  // External service errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  AUTH_ERROR = 'AUTH_ERROR',
  RATE_LIMIT_ERROR = 'RATE_LIMIT_ERROR',
  API_ERROR = 'API_ERROR',
  AI_SERVICE_ERROR = 'AI_SERVICE_ERROR',
  AI_TIMEOUT_ERROR = 'AI_TIMEOUT_ERROR',
  SEARCH_FAILED = 'SEARCH_FAILED',

  // Request-level errors
  PIPELINE_FAILED = 'PIPELINE_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface StructuredError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: Error;
  timestamp: string;
  context?: Record<string, unknown>;
}

export class NamingAssistantError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'NamingAssistantError';
    this.code = code;
    this.details = details;
    this.context = context;
  }
}

export class ConfigurationError extends NamingAssistantError {
  constructor(code: ErrorCode.MISSING_CONFIG | ErrorCode.INVALID_CONFIG, message: string, fields: string[]) {
    super(code, message, { fields });
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends NamingAssistantError {
  constructor(field: string, message: string, context?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, `Validation error for ${field}: ${message}`, { field }, context);
    this.name = 'ValidationError';
  }
}

export class SearchServiceError extends NamingAssistantError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(statusCodeToErrorCode(statusCode), message, { statusCode, ...details });
    this.name = 'SearchServiceError';
    this.statusCode = statusCode;
  }
}

/**
 * Raised by the orchestrator when a request fails outside the guarded component paths.
 */
export class PipelineError extends NamingAssistantError {
  public readonly state: PipelineState;

  constructor(state: PipelineState, cause: unknown) {
    const reason = toErrorMessage(cause);
    const code = cause instanceof NamingAssistantError ? cause.code : ErrorCode.PIPELINE_FAILED;
    super(code, `Request failed while ${state}: ${reason}`, { state, reason });
    this.name = 'PipelineError';
    this.state = state;
  }
}

function statusCodeToErrorCode(statusCode?: number): ErrorCode {
  if (statusCode === 401 || statusCode === 403) return ErrorCode.AUTH_ERROR;
  if (statusCode === 429) return ErrorCode.RATE_LIMIT_ERROR;
  if (statusCode === undefined) return ErrorCode.NETWORK_ERROR;
  return ErrorCode.SEARCH_FAILED;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ErrorHandler {
  /**
   * Create a structured error record from any thrown value
   */
  static createError(error: unknown, context?: Record<string, unknown>): StructuredError {
    const timestamp = new Date().toISOString();

    if (error instanceof NamingAssistantError) {
      return {
        code: error.code,
        message: error.message,
        details: error.details,
        originalError: error,
        timestamp,
        context: { ...error.context, ...context },
      };
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      const classify = (code: ErrorCode, text: string): StructuredError => ({
        code,
        message: text,
        details: { originalError: error.message },
        originalError: error,
        timestamp,
        context,
      });

      if (message.includes('timeout') || message.includes('timed out')) {
        return classify(ErrorCode.AI_TIMEOUT_ERROR, 'Operation timed out');
      }
      if (message.includes('rate limit') || message.includes('429')) {
        return classify(ErrorCode.RATE_LIMIT_ERROR, 'Rate limit exceeded, please try again later');
      }
      if (message.includes('401') || message.includes('403') || message.includes('unauthorized')) {
        return classify(ErrorCode.AUTH_ERROR, 'Authentication with an external service failed');
      }
      if (message.includes('network') || message.includes('econnrefused') || message.includes('enotfound')) {
        return classify(ErrorCode.NETWORK_ERROR, 'Network connection failed');
      }

      return classify(ErrorCode.INTERNAL_ERROR, 'An internal error occurred');
    }

    return {
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'An unknown error occurred',
      details: { error: String(error) },
      timestamp,
      context,
    };
  }

  /**
   * Log an error and return its structured form
   */
  static handleError(
    error: unknown,
    context?: Record<string, unknown>,
    logLevel: 'error' | 'warn' = 'error'
  ): StructuredError {
    const structured = this.createError(error, context);
    const logContext = {
      code: structured.code,
      ...structured.context,
      ...structured.details,
    };

    if (logLevel === 'warn') {
      logger.warn(structured.message, logContext);
    } else {
      logger.error(structured.message, logContext);
    }

    return structured;
  }

  static getUserFriendlyMessage(error: StructuredError): string {
    switch (error.code) {
      case ErrorCode.MISSING_CONFIG:
      case ErrorCode.INVALID_CONFIG:
        return 'Please check your configuration and environment variables.';
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.INVALID_INPUT:
        return error.message;
      case ErrorCode.NETWORK_ERROR:
        return 'Please check your network connection and try again.';
      case ErrorCode.AUTH_ERROR:
        return 'An external service rejected the configured credentials.';
      case ErrorCode.RATE_LIMIT_ERROR:
        return 'Rate limit exceeded. Please wait a moment and try again.';
      case ErrorCode.AI_TIMEOUT_ERROR:
        return 'The operation timed out. Please try again.';
      default:
        return 'An unexpected error occurred while processing the request. Please try again.';
    }
  }
}

export const createError = ErrorHandler.createError.bind(ErrorHandler);
export const handleError = ErrorHandler.handleError.bind(ErrorHandler);
export const getUserFriendlyMessage = ErrorHandler.getUserFriendlyMessage.bind(ErrorHandler);
