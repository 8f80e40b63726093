import { randomUUID } from 'crypto';
import { BaseError } from './BaseError';

/**
 * Create a new correlation ID for request tracking
 */
export function createCorrelationId(): string {
  return randomUUID();
}

/**
 * Sanitize error message for log output
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/token[^s]*=\s*[^\s]*/gi, 'token=***')
    .replace(/key[^s]*=\s*[^\s]*/gi, 'key=***')
    .replace(/secret[^s]*=\s*[^\s]*/gi, 'secret=***')
    .replace(/authorization:\s*[^\s]*/gi, 'authorization: ***');
}

/**
 * Format error for logging
 */
export function formatErrorForLogging(error: unknown, includeStack: boolean = true): Record<string, unknown> {
  if (error instanceof BaseError) {
    const formatted = error.toLogFormat();
    if (!includeStack) {
      formatted.error.stack = undefined;
      if (formatted.error.cause) {
        formatted.error.cause.stack = undefined;
      }
    }
    return formatted;
  }

  if (error instanceof Error) {
    return {
      error: {
        name: error.name,
        message: sanitizeErrorMessage(error.message),
        stack: includeStack ? error.stack : undefined,
      },
    };
  }

  return {
    error: {
      message: String(error),
      type: typeof error,
    },
  };
}
