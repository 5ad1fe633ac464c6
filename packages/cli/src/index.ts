/**
 * @barreplay/cli - Command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/coerce.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './core/execute.js';
export * from './types/index.js';
export * from './command-defs/backtest.js';
export { registerBacktestCommands, coerceRunOptions } from './commands/backtest.js';
export * from './handlers/backtest/run-backtest.js';
export * from './handlers/backtest/list-strategies.js';
