/**
 * Package-aware logging
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@barreplay/utils';
 *
 * const logger = createPackageLogger('@barreplay/simulation');
 * logger.info('Backtest started', { bars: 1000 });
 * ```
 */

import { createLogger, type Logger, type LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log helpers for recurring engine events
 */
export class LogHelpers {
  /**
   * Log a simulation run summary
   */
  static simulation(
    logger: Logger,
    runName: string,
    summary: Record<string, unknown>,
    context?: LogContext
  ): void {
    logger.info('Simulation Completed', { runName, ...summary, ...context });
  }

  static performance(
    logger: Logger,
    operation: string,
    duration: number,
    success: boolean,
    context?: LogContext
  ): void {
    logger.debug('Performance Metric', { operation, duration, success, ...context });
  }
}
