/**
 * Shard Pool
 * ==========
 * Fixed-size pool of workers running independent shard tasks. Workers pull
 * the next task by position; results come back in submission order. The
 * first failure stops the pool from taking new tasks and aborts the run.
 */

import { LogHelpers, ShardExecutionError } from '@barreplay/utils';
import type { BarKey, BarRecord } from '../types/bar.js';
import { logger } from '../logger.js';

export interface ShardParams {
  makerFee: number;
  takerFee: number;
  balanceInit: number;
  logarithmic: boolean;
  name: string | null;
}

/**
 * Self-contained unit of work: a bar slice and the run parameters
 */
export interface ShardTask {
  shardIndex: number;
  bars: BarRecord[];
  params: ShardParams;
}

export type ShardExecutor<T> = (task: ShardTask) => T | Promise<T>;

function keyRange(task: ShardTask): { firstKey: BarKey | null; lastKey: BarKey | null } {
  const first = task.bars[0];
  const last = task.bars[task.bars.length - 1];
  return { firstKey: first ? first.key : null, lastKey: last ? last.key : null };
}

export async function runShardPool<T>(
  tasks: readonly ShardTask[],
  execute: ShardExecutor<T>,
  parallelWorkers: number
): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  const workerCount = Math.max(1, Math.min(parallelWorkers, tasks.length));
  let nextIndex = 0;
  const state: { failure: ShardExecutionError | null } = { failure: null };

  const worker = async (workerId: number): Promise<void> => {
    while (state.failure === null && nextIndex < tasks.length) {
      const index = nextIndex++;
      // Each worker owns a private copy: no state is shared between shards
      const task = structuredClone(tasks[index]);
      const started = Date.now();
      const shardLogger = logger.child({ shardIndex: task.shardIndex, workerId });
      shardLogger.debug('Shard started', { bars: task.bars.length, ...keyRange(task) });
      try {
        results[index] = await execute(task);
      } catch (error) {
        LogHelpers.performance(shardLogger, 'shard', Date.now() - started, false);
        state.failure ??= new ShardExecutionError(task.shardIndex, error, keyRange(task));
        return;
      }
      LogHelpers.performance(shardLogger, 'shard', Date.now() - started, true);
      // Let the other workers interleave between shards
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  };

  await Promise.all(Array.from({ length: workerCount }, (_, i) => worker(i)));

  if (state.failure !== null) {
    logger.error('Shard execution failed, aborting run', state.failure);
    throw state.failure;
  }
  return results;
}
