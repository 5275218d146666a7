/**
 * Centralized error type definitions for the architecture scraper
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',

  // Scrape pipeline
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TEMPLATE_FETCH_ERROR = 'TEMPLATE_FETCH_ERROR',
  TEMPLATE_PARSE_ERROR = 'TEMPLATE_PARSE_ERROR',
  STORAGE_ERROR = 'STORAGE_ERROR',
  SCRAPE_CANCELLED = 'SCRAPE_CANCELLED',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable', context?: Record<string, unknown>) {
    super(message, ErrorCode.SERVICE_UNAVAILABLE, 503, true, context);
  }
}

/**
 * Invalid source specification or scraper setting.
 * Fatal to the one source it concerns.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 400, true, context);
  }
}

/**
 * Upstream rejected the credential (401, or a 403 that is not a quota signal)
 */
export class AuthenticationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.AUTHENTICATION_ERROR, 401, true, context);
  }
}

/**
 * Quota still exhausted after the bounded number of waits
 */
export class RateLimitExceededError extends AppError {
  public readonly resetAt?: Date;

  constructor(message: string = 'Upstream rate limit exceeded', resetAt?: Date, context?: Record<string, unknown>) {
    super(message, ErrorCode.RATE_LIMIT_EXCEEDED, 429, true, { resetAt: resetAt?.toISOString(), ...context });
    this.resetAt = resetAt;
  }
}

/**
 * Transport failure that survived exponential backoff
 */
export class NetworkError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.NETWORK_ERROR, 502, true, context);
  }
}

export class TemplateFetchError extends AppError {
  constructor(path: string, status: number, context?: Record<string, unknown>) {
    super(`Failed to fetch template content for '${path}' (HTTP ${status})`, ErrorCode.TEMPLATE_FETCH_ERROR, 502, true, {
      path,
      status,
      ...context,
    });
  }
}

/**
 * Malformed or unusable template. Always recovered locally: the file is skipped.
 */
export class TemplateParseError extends AppError {
  constructor(path: string, reason: string) {
    super(`Cannot parse template '${path}': ${reason}`, ErrorCode.TEMPLATE_PARSE_ERROR, 422, true, { path, reason });
  }
}

export class StorageError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.STORAGE_ERROR, 500, false, context);
  }
}

export class ScrapeCancelledError extends AppError {
  constructor(message: string = 'Scrape cancelled') {
    super(message, ErrorCode.SCRAPE_CANCELLED, 499, true);
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}

/**
 * Message of an unknown thrown value, for log fields and summaries
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
