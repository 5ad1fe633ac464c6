/**
 * Result Merger
 * =============
 * Stitches the ledger of an earlier run and a later run into one continuous
 * ledger. Every shard starts from a fresh balance, so the later curve is
 * re-based onto the earlier one at the seam:
 *
 * - logarithmic: the later run is rescaled by earlierEquity[last] / laterEquity[first]
 *   so returns chain multiplicatively
 * - linear: the later run's initial capital is removed once, since both
 *   curves carry a full balanceInit
 *
 * Curves are aligned on the union of keys; gaps in equity and balance are
 * filled forward then backward, gaps in position are zero.
 */

import { MergeError } from '@barreplay/utils';
import type { BarKey } from '../types/bar.js';
import type { FinishedOrder } from '../types/finished-order.js';
import type { BacktestResult, FeeRate, Ledger } from '../types/ledger.js';
import { ledgerLength, scaleLedger } from '../ledger/series.js';
import { logger } from '../logger.js';

function unionKeys(a: readonly BarKey[], b: readonly BarKey[]): BarKey[] {
  const keys: BarKey[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    if (j >= b.length || (i < a.length && a[i] < b[j])) {
      keys.push(a[i++]);
    } else if (i >= a.length || b[j] < a[i]) {
      keys.push(b[j++]);
    } else {
      keys.push(a[i]);
      i++;
      j++;
    }
  }
  return keys;
}

/**
 * Reindex a series onto `keys`; missing entries are null
 */
function reindex(
  keys: readonly BarKey[],
  sourceKeys: readonly BarKey[],
  values: readonly number[]
): (number | null)[] {
  const byKey = new Map<BarKey, number>();
  sourceKeys.forEach((key, i) => byKey.set(key, values[i]));
  return keys.map((key) => byKey.get(key) ?? null);
}

function forwardBackwardFill(values: readonly (number | null)[]): number[] {
  const filled: (number | null)[] = [...values];
  let last: number | null = null;
  for (let i = 0; i < filled.length; i++) {
    const value = filled[i];
    if (value === null) {
      filled[i] = last;
    } else {
      last = value;
    }
  }
  let next: number | null = null;
  for (let i = filled.length - 1; i >= 0; i--) {
    const value = filled[i];
    if (value === null) {
      filled[i] = next;
    } else {
      next = value;
    }
  }
  // Only an all-empty series stays null, and merge never builds one
  return filled.map((value) => value ?? 0);
}

function addFilled(
  keys: readonly BarKey[],
  a: { keys: readonly BarKey[]; values: readonly number[] },
  b: { keys: readonly BarKey[]; values: readonly number[] },
  offset: number
): number[] {
  const left = forwardBackwardFill(reindex(keys, a.keys, a.values));
  const right = forwardBackwardFill(reindex(keys, b.keys, b.values));
  return left.map((value, i) => value + right[i] - offset);
}

function addZeroFilled(
  keys: readonly BarKey[],
  a: { keys: readonly BarKey[]; values: readonly number[] },
  b: { keys: readonly BarKey[]; values: readonly number[] }
): number[] {
  const left = reindex(keys, a.keys, a.values);
  const right = reindex(keys, b.keys, b.values);
  return left.map((value, i) => (value ?? 0) + (right[i] ?? 0));
}

function mergeFeeRate(a: FeeRate, b: FeeRate): FeeRate {
  if (a.kind === 'fixed' && b.kind === 'fixed' && a.rate === b.rate) {
    return a;
  }
  return { kind: 'mixed' };
}

function mergeName(a: string | null, b: string | null): string | null {
  if (a === null && b === null) return null;
  return `${a ?? ''} + ${b ?? ''}`;
}

function mergeLedgers(
  earlier: Ledger,
  later: Ledger,
  logarithmic: boolean,
  laterBalanceInit: number
): Ledger {
  const seam = earlier.equityQuote[earlier.equityQuote.length - 1];
  const laterFirstEquity = later.equityQuote[0];

  let rebased: Ledger = later;
  if (logarithmic) {
    if (!(laterFirstEquity > 0) || !(seam >= 0)) {
      throw new MergeError('Cannot rebase a logarithmic curve on a non-positive equity', {
        seam,
        laterFirstEquity,
      });
    }
    // Fills are shard-local transaction amounts and stay unscaled
    rebased = {
      ...scaleLedger(later, seam / laterFirstEquity),
      finishedOrders: later.finishedOrders,
    };
  }
  const overlap = logarithmic ? seam : laterBalanceInit;

  // The balance is pinned to the equity on both sides of the seam so the
  // fills around it do not show a spurious dip or jump
  const earlierBalance = [...earlier.balanceQuote];
  earlierBalance[earlierBalance.length - 1] = seam;
  const laterBalance = [...rebased.balanceQuote];
  laterBalance[0] = rebased.equityQuote[0];

  const keys = unionKeys(earlier.keys, later.keys);
  const series = (a: readonly number[], b: readonly number[]) => ({
    a: { keys: earlier.keys, values: a },
    b: { keys: later.keys, values: b },
  });

  const equity = series(earlier.equityQuote, rebased.equityQuote);
  const balance = series(earlierBalance, laterBalance);
  const position = series(earlier.position, rebased.position);
  const positionQuote = series(earlier.positionQuote, rebased.positionQuote);

  const earlierIndex = new Map(earlier.keys.map((key, i) => [key, i]));
  const laterIndex = new Map(later.keys.map((key, i) => [key, i]));

  const close: number[] = [];
  const finishedOrders: FinishedOrder[][] = [];
  for (const key of keys) {
    const i = earlierIndex.get(key);
    const j = laterIndex.get(key);
    close.push(i !== undefined ? earlier.close[i] : j !== undefined ? later.close[j] : NaN);
    finishedOrders.push([
      ...(i !== undefined ? earlier.finishedOrders[i] : []),
      ...(j !== undefined ? later.finishedOrders[j] : []),
    ]);
  }

  return {
    keys,
    close,
    position: addZeroFilled(keys, position.a, position.b),
    positionQuote: addZeroFilled(keys, positionQuote.a, positionQuote.b),
    balanceQuote: addFilled(keys, balance.a, balance.b, overlap),
    equityQuote: addFilled(keys, equity.a, equity.b, overlap),
    finishedOrders,
  };
}

/**
 * Merge an earlier and a later result into one continuous result
 */
export function mergeResults(earlier: BacktestResult, later: BacktestResult): BacktestResult {
  if (earlier.logarithmic !== later.logarithmic) {
    throw new MergeError('Cannot add backtest results with different logarithmic settings', {
      earlier: earlier.name,
      later: later.name,
    });
  }

  const name = mergeName(earlier.name, later.name);
  const makerFeeRate = mergeFeeRate(earlier.makerFeeRate, later.makerFeeRate);
  const takerFeeRate = mergeFeeRate(earlier.takerFeeRate, later.takerFeeRate);

  if (ledgerLength(later.ledger) === 0) {
    return { ...earlier, name, makerFeeRate, takerFeeRate };
  }
  if (ledgerLength(earlier.ledger) === 0) {
    return { ...later, name, makerFeeRate, takerFeeRate };
  }

  logger.debug('Merging ledgers', {
    earlierBars: ledgerLength(earlier.ledger),
    laterBars: ledgerLength(later.ledger),
    logarithmic: earlier.logarithmic,
  });

  return {
    name,
    ledger: mergeLedgers(earlier.ledger, later.ledger, earlier.logarithmic, later.balanceInit),
    makerFeeRate,
    takerFeeRate,
    logarithmic: earlier.logarithmic,
    balanceInit: earlier.balanceInit,
  };
}

/**
 * Strict left-to-right pairwise reduction of shard results
 */
export function reduceResults(results: readonly BacktestResult[]): BacktestResult {
  if (results.length === 0) {
    throw new MergeError('Cannot reduce an empty list of results');
  }
  return results.slice(1).reduce((acc, next) => mergeResults(acc, next), results[0]);
}
