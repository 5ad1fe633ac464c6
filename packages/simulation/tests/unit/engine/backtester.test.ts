import { describe, it, expect, vi } from 'vitest';
import { AggregateValidationError, ShardExecutionError } from '@barreplay/utils';
import { runBacktest } from '../../../src/engine/backtester.js';
import { marketOrder } from '../../../src/types/order.js';
import type { Strategy } from '../../../src/types/strategy.js';
import type { Ledger } from '../../../src/types/ledger.js';
import { risingBars } from '../../fixtures/bars.js';

/**
 * Buys one unit on `buyAt` and sells it on `sellAt`, flat otherwise
 */
function roundTrip(buyAt: number, sellAt: number): Strategy {
  return {
    name: 'round-trip',
    produceOrders: (snapshot) => {
      if (snapshot.index === buyAt) return [marketOrder(1)];
      if (snapshot.index === sellAt) return [marketOrder(-1)];
      return [];
    },
  };
}

function expectCurvesClose(actual: Ledger, expected: Ledger): void {
  expect(actual.keys).toEqual(expected.keys);
  actual.equityQuote.forEach((value, i) => {
    expect(value).toBeCloseTo(expected.equityQuote[i], 9);
  });
  actual.balanceQuote.forEach((value, i) => {
    expect(value).toBeCloseTo(expected.balanceQuote[i], 9);
  });
  expect(actual.position).toEqual(expected.position);
}

const options = { makerFee: 0.001, takerFee: 0.002, balanceInit: 1000 };

describe('runBacktest', () => {
  it('runs a single shard inline', async () => {
    const result = await runBacktest(roundTrip(1, 3), risingBars(10), {
      ...options,
      name: 'single',
    });

    expect(result.name).toBe('single');
    expect(result.ledger.keys).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(result.makerFeeRate).toEqual({ kind: 'fixed', rate: 0.001 });
    expect(result.takerFeeRate).toEqual({ kind: 'fixed', rate: 0.002 });
    expect(result.logarithmic).toBe(true);
    expect(result.balanceInit).toBe(1000);
    // Bought at the close of bar 1 (101.5), sold at the close of bar 3 (103.5)
    expect(result.ledger.position).toEqual([0, 0, 1, 1, 0, 0, 0, 0, 0, 0]);
    expect(result.ledger.equityQuote[9]).toBeCloseTo(1000 - 101.5 * 1.002 + 103.5 * 0.998, 9);
  });

  describe.each([true, false])('with logarithmic=%s', (logarithmic) => {
    it('matches the single-shard curve when split in two', async () => {
      const single = await runBacktest(roundTrip(1, 3), risingBars(10), {
        ...options,
        logarithmic,
      });
      const split = await runBacktest(() => roundTrip(1, 3), risingBars(10), {
        ...options,
        logarithmic,
        splits: 2,
      });

      expectCurvesClose(split.ledger, single.ledger);
      expect(split.ledger.finishedOrders.flat()).toHaveLength(2);
    });

    it('matches the single-shard curve with one shard per core', async () => {
      const single = await runBacktest(roundTrip(0, 1), risingBars(10), {
        ...options,
        logarithmic,
      });
      const split = await runBacktest(
        () => roundTrip(0, 1),
        risingBars(10),
        { ...options, logarithmic, splits: -1 },
        4
      );

      expectCurvesClose(split.ledger, single.ledger);
    });
  });

  it('clamps the shard count to the number of bars', async () => {
    const result = await runBacktest(() => roundTrip(-1, -1), risingBars(3), {
      ...options,
      splits: 10,
    });

    expect(result.ledger.keys).toEqual([0, 1, 2]);
    expect(result.ledger.equityQuote).toEqual([1000, 1000, 1000]);
  });

  it('gives every shard its own strategy instance from a factory', async () => {
    const factory = vi.fn(() => roundTrip(-1, -1));

    await runBacktest(factory, risingBars(9), { ...options, splits: 3 });

    expect(factory).toHaveBeenCalledTimes(3);
  });

  it('keeps the requested name on merged results', async () => {
    const result = await runBacktest(() => roundTrip(-1, -1), risingBars(4), {
      ...options,
      splits: 2,
      name: 'merged',
    });

    expect(result.name).toBe('merged');
  });

  it('rejects invalid input before simulating', async () => {
    const produceOrders = vi.fn(() => []);

    const run = runBacktest(
      { produceOrders },
      [{ key: 1, open: 10, high: 9, low: 8, close: 9 }],
      { ...options, balanceInit: 0 }
    );

    await expect(run).rejects.toBeInstanceOf(AggregateValidationError);
    await expect(run).rejects.toMatchObject({
      errors: [
        { message: 'balance_init must be greater than 0' },
        { message: 'open price must be less than high price' },
      ],
    });
    expect(produceOrders).not.toHaveBeenCalled();
  });

  it('aborts the whole run when a shard fails', async () => {
    const failing = (): Strategy => ({
      produceOrders: (snapshot) => {
        if (snapshot.index === 7) {
          throw new Error('strategy exploded');
        }
        return [];
      },
    });

    await expect(
      runBacktest(failing, risingBars(10), { ...options, splits: 2 })
    ).rejects.toMatchObject({
      shardIndex: 1,
      message: 'Shard 1 failed: strategy exploded',
    });
    await expect(
      runBacktest(failing, risingBars(10), { ...options, splits: 2 })
    ).rejects.toBeInstanceOf(ShardExecutionError);
  });
});
