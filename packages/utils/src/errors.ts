/**
 * Custom Error Classes
 * ====================
 * Standardized errors for the backtest engine and its collaborators.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Every rule violated at the input boundary, reported together.
 */
export class AggregateValidationError extends AppError {
  public readonly errors: readonly ValidationError[];

  constructor(errors: readonly ValidationError[], context?: ErrorContext) {
    super(
      `Invalid arguments (${errors.length}): ${errors.map((e) => e.message).join('; ')}`,
      'AGGREGATE_VALIDATION_ERROR',
      { ...context, violations: errors.map((e) => e.message) }
    );
    this.errors = errors;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, identifier, ...context });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * Logic fault in order handling (zero size, wrong-sign handler).
 * Not operational: it aborts the whole run.
 */
export class InvalidOrderError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'INVALID_ORDER', context, false);
  }
}

/**
 * Two ledgers that cannot be combined.
 */
export class MergeError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'MERGE_ERROR', context, false);
  }
}

/**
 * A shard failed; the run is aborted without a partial result.
 */
export class ShardExecutionError extends AppError {
  public readonly shardIndex: number;
  public readonly cause: unknown;

  constructor(shardIndex: number, cause: unknown, context?: ErrorContext) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Shard ${shardIndex} failed: ${reason}`,
      'SHARD_EXECUTION_ERROR',
      { shardIndex, ...context },
      false
    );
    this.shardIndex = shardIndex;
    this.cause = cause;
  }
}

export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
