/**
 * Error Handler
 * =============
 * Centralized error logging.
 */

import { AggregateValidationError, AppError, isOperationalError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  operational: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    operational: isOperationalError(err),
  };
}

/**
 * Flatten an error into the lines shown to a user.
 * Aggregated validation failures list every violated rule.
 */
export function describeError(error: unknown): string[] {
  if (error instanceof AggregateValidationError) {
    return ['Invalid arguments:', ...error.errors.map((e) => `  - ${e.message}`)];
  }
  if (error instanceof Error) {
    return [error.message];
  }
  return [String(error)];
}
