/**
 * Partitioner
 * ===========
 * Position-based splitting of a bar sequence into contiguous shards.
 */

import { availableParallelism } from 'os';
import { ValidationError } from '@barreplay/utils';

export function getCpuCount(): number {
  return availableParallelism();
}

/**
 * Resolve the requested split count. Negative counts are relative to the
 * available parallelism: -1 means every core, -2 all but one, and so on.
 */
export function resolveSplitCount(splits: number, cpuCount: number = getCpuCount()): number {
  if (!Number.isInteger(splits)) {
    throw new ValidationError(`splits must be an integer, got ${splits}`, { splits });
  }
  if (splits === 0) {
    throw new ValidationError('splits must be not 0', { splits });
  }
  if (splits < -cpuCount) {
    throw new ValidationError(`splits must be greater than -cpuCount=${-cpuCount}`, {
      splits,
      cpuCount,
    });
  }
  return splits < 0 ? cpuCount + splits + 1 : splits;
}

/**
 * Split into k contiguous chunks whose sizes differ by at most one; the
 * first (length % k) chunks take the extra element. k is capped at the
 * number of items so no chunk is empty.
 */
export function partition<T>(items: readonly T[], k: number): T[][] {
  if (!Number.isInteger(k) || k < 1) {
    throw new ValidationError(`partition count must be a positive integer, got ${k}`, { k });
  }
  const count = Math.min(k, items.length);
  const chunks: T[][] = [];
  const base = Math.floor(items.length / Math.max(count, 1));
  const extra = count === 0 ? 0 : items.length % count;

  let start = 0;
  for (let i = 0; i < count; i++) {
    const size = base + (i < extra ? 1 : 0);
    chunks.push(items.slice(start, start + size));
    start += size;
  }
  return chunks;
}
