/**
 * @barreplay/utils - Shared utilities package
 *
 * Logger utilities, configuration loading and error handling.
 */

export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';
export { createPackageLogger, LogHelpers } from './logging/index.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, describeError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
