import { MongoError, MongoServerError, MongoNetworkError } from 'mongodb';
import { logger } from './logger.js';
import { StorageError, isAppError } from '../types/errors.js';

/**
 * Error type classification
 */
export type DatabaseErrorType = 'connection' | 'duplicate' | 'validation' | 'query' | 'unknown';

/**
 * Classify MongoDB error type
 */
export function classifyDatabaseError(error: unknown): {
  type: DatabaseErrorType;
  code?: number;
  isTransient: boolean;
} {
  if (!(error instanceof Error)) {
    return { type: 'unknown', isTransient: false };
  }

  // MongoDB duplicate key error (E11000)
  if (error instanceof MongoServerError && error.code === 11000) {
    return { type: 'duplicate', code: 11000, isTransient: false };
  }

  if (error instanceof MongoNetworkError) {
    return { type: 'connection', isTransient: true };
  }

  if (error instanceof MongoServerError) {
    const code = typeof error.code === 'number' ? error.code : undefined;
    // DocumentValidationFailure
    if (code === 121 || error.message.includes('validation')) {
      return { type: 'validation', code, isTransient: false };
    }
    return { type: 'query', code, isTransient: false };
  }

  if (error instanceof MongoError) {
    const transientCodes = [6, 7, 89, 91, 11600, 11602];
    const code = typeof error.code === 'number' ? error.code : undefined;
    return { type: 'connection', code, isTransient: code !== undefined && transientCodes.includes(code) };
  }

  const message = error.message.toLowerCase();
  if (['connection', 'network', 'timeout', 'econnrefused', 'enotfound'].some((pattern) => message.includes(pattern))) {
    return { type: 'connection', isTransient: true };
  }

  return { type: 'unknown', isTransient: false };
}

/**
 * Sanitize error message for logging and user display
 * Removes connection strings and credentials
 */
export function sanitizeErrorMessage(error: unknown, context?: string): string {
  if (!(error instanceof Error)) {
    return context ? `${context}: An unknown error occurred` : 'An unknown error occurred';
  }

  const message = error.message
    .replace(/mongodb(\+srv)?:\/\/[^\s]+/gi, 'mongodb://***')
    .replace(/:\/\/[^:]+:[^@]+@/g, '://***:***@');

  return context ? `${context}: ${message}` : message;
}

/**
 * Run a database operation, converting driver failures into StorageError.
 * Application errors raised inside the operation pass through unchanged.
 */
export async function handleDatabaseOperation<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }
    const classification = classifyDatabaseError(error);
    const message = sanitizeErrorMessage(error, operationName);
    logger.error({ operation: operationName, ...classification, error: message }, 'Database operation failed');
    throw new StorageError(message, { operation: operationName, ...classification });
  }
}
