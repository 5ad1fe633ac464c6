/**
 * Backtester
 * ==========
 * Entry point of a run: validate, then simulate either one shard inline or
 * k shards on the pool, and reduce the shard results left to right.
 */

import { LogHelpers } from '@barreplay/utils';
import type { BarTable } from '../types/bar.js';
import type { BacktestResult, Ledger } from '../types/ledger.js';
import { resolveStrategy, type StrategySource } from '../types/strategy.js';
import {
  validateBacktestInput,
  type BacktestOptionsInput,
} from '../validation/input-validation.js';
import { simulateShard } from './simulation-loop.js';
import { getCpuCount, partition, resolveSplitCount } from './partitioner.js';
import { runShardPool, type ShardParams, type ShardTask } from './shard-pool.js';
import { reduceResults } from './result-merger.js';
import { logger } from '../logger.js';

function toResult(ledger: Ledger, params: ShardParams): BacktestResult {
  return {
    name: params.name,
    ledger,
    makerFeeRate: { kind: 'fixed', rate: params.makerFee },
    takerFeeRate: { kind: 'fixed', rate: params.takerFee },
    logarithmic: params.logarithmic,
    balanceInit: params.balanceInit,
  };
}

/**
 * Replay a strategy over a bar table.
 *
 * With a strategy factory every shard gets its own instance; a plain
 * instance is shared by all shards and must not keep cross-bar state
 * when `splits` is not 1.
 */
export async function runBacktest(
  strategy: StrategySource,
  table: BarTable,
  options: BacktestOptionsInput,
  cpuCount: number = getCpuCount()
): Promise<BacktestResult> {
  const { bars, options: opts } = validateBacktestInput(table, options, cpuCount);
  const params: ShardParams = {
    makerFee: opts.makerFee,
    takerFee: opts.takerFee,
    balanceInit: opts.balanceInit,
    logarithmic: opts.logarithmic,
    name: opts.name,
  };
  const started = Date.now();

  if (opts.splits === 1) {
    logger.debug('Running single shard', { bars: bars.length, runName: opts.name ?? undefined });
    const ledger = simulateShard(resolveStrategy(strategy), bars, params);
    LogHelpers.simulation(logger, opts.name ?? 'unnamed', {
      bars: bars.length,
      shards: 1,
      durationMs: Date.now() - started,
    });
    return toResult(ledger, params);
  }

  const requested = resolveSplitCount(opts.splits, cpuCount);
  const chunks = partition(bars, requested);
  logger.debug('Resolved split count', {
    splits: opts.splits,
    requested,
    shards: chunks.length,
    cpuCount,
  });

  const tasks: ShardTask[] = chunks.map((chunk, shardIndex) => ({
    shardIndex,
    bars: chunk,
    params,
  }));
  const parallelWorkers = Math.min(chunks.length, opts.parallelWorkers ?? cpuCount);

  const results = await runShardPool(
    tasks,
    (task) => toResult(simulateShard(resolveStrategy(strategy), task.bars, task.params), task.params),
    parallelWorkers
  );
  const merged = reduceResults(results);

  LogHelpers.simulation(logger, opts.name ?? 'unnamed', {
    bars: bars.length,
    shards: chunks.length,
    parallelWorkers,
    durationMs: Date.now() - started,
  });
  return { ...merged, name: opts.name };
}
