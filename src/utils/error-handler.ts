/**
 * Centralized error handling utilities
 */

import { createLogger } from './logger.js';
import { APIResponseError, ErrorContext, PatcherError } from './errors.js';

const logger = createLogger('error-handler');

const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN'];

/**
 * Convert any thrown value to a PatcherError
 */
export function normalizeError(error: unknown, context?: ErrorContext): PatcherError {
  if (error instanceof PatcherError) {
    return error;
  }

  if (error instanceof Error) {
    // Network failures that escaped the HTTP client
    if (NETWORK_ERROR_CODES.some((code) => error.message.includes(code))) {
      return new APIResponseError(
        'Network request failed',
        { url: String(context?.url ?? 'unknown'), reason: error.message },
        { cause: error }
      );
    }

    return new PatcherError(error.message, {
      errorCode: 'UNKNOWN_ERROR',
      suggestions: ['Run again with --debug and check the log file for details'],
      context,
      cause: error,
    });
  }

  // Not an Error object
  return new PatcherError(String(error), {
    errorCode: 'UNKNOWN_ERROR',
    context,
  });
}

/**
 * Log an error with its code, context and stack, then return it normalized
 */
export function logErrorWithContext(error: unknown, operation: string, context?: ErrorContext): PatcherError {
  const normalized = normalizeError(error, context);
  logger.error(
    {
      operation,
      code: normalized.errorCode,
      context: normalized.context,
      stack: normalized.stack,
      cause: normalized.originalError?.message,
    },
    `${operation} failed: ${normalized.message}`
  );
  return normalized;
}

/**
 * Log unhandled rejections and uncaught exceptions before exiting
 */
export function setupGlobalErrorHandlers(onFatal: (error: PatcherError) => void = () => process.exit(1)): void {
  process.on('unhandledRejection', (reason) => {
    onFatal(logErrorWithContext(reason, 'Unhandled rejection'));
  });

  process.on('uncaughtException', (error: Error) => {
    onFatal(logErrorWithContext(error, 'Uncaught exception'));
  });
}
