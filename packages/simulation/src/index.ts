/**
 * @barreplay/simulation - Bar Replay Engine
 * ==========================================
 *
 * Replays a strategy over OHLC bars and records a time-aligned ledger of
 * position, balance and equity.
 *
 * ## Architecture
 *
 * - **types/**: bars, order requests, finished orders, ledger, strategy capability
 * - **execution/**: order matcher (maker / taker / post-only / not filled)
 * - **engine/**: simulation loop, partitioner, shard pool, result merger, backtester
 * - **validation/**: input checks, reported all at once
 * - **ledger/**: ledger views and scaled copies
 * - **reporting/**: performance summary
 * - **data/**: CSV loading
 * - **strategies/**: reference strategies
 *
 * ## Quick Start
 *
 * ```typescript
 * import { runBacktest, loadBarsFromCsv, smaCross, summarizeBacktest } from '@barreplay/simulation';
 *
 * const table = await loadBarsFromCsv('bars.csv');
 * const result = await runBacktest(() => smaCross(), table, {
 *   makerFee: 0.001,
 *   takerFee: 0.002,
 *   splits: -1,
 * });
 * console.log(summarizeBacktest(result).sharpeRatio);
 * ```
 */

export * from './types/index.js';

export * from './execution/order-matcher.js';

export * from './engine/simulation-loop.js';
export * from './engine/partitioner.js';
export * from './engine/shard-pool.js';
export * from './engine/result-merger.js';
export * from './engine/backtester.js';

export * from './validation/input-validation.js';
export * from './ledger/series.js';
export * from './reporting/metrics.js';
export * from './data/csv-loader.js';
export * from './strategies/presets.js';
