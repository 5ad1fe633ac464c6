/**
 * Error Handler - User-facing error lines
 */

import { describeError, handleError as logError } from '@barreplay/utils';

/**
 * Format error for user display. Aggregated validation failures list every
 * violated rule on its own line.
 */
export function formatError(error: unknown): string[] {
  if (error instanceof Error || typeof error === 'string') {
    return describeError(error);
  }
  return ['An unexpected error occurred'];
}

/**
 * Log the error and return the lines to print
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string[] {
  logError(error, context);
  return formatError(error);
}
