/**
 * Simulation Loop
 * ===============
 * Sequential bar-by-bar driver for one shard. Each bar:
 *
 * 1. resolve the orders carried from the previous bar against this bar,
 *    using the previous close as reference price
 * 2. snapshot position, balance and equity at this bar's open
 * 3. ask the strategy for the next bar's orders (replacing all carried orders)
 * 4. record one ledger row
 */

import type { BarKey, BarRecord } from '../types/bar.js';
import type { FinishedOrder } from '../types/finished-order.js';
import { isFilled } from '../types/finished-order.js';
import type { Ledger } from '../types/ledger.js';
import type { OrderRequest } from '../types/order.js';
import type { BarSnapshot, Strategy } from '../types/strategy.js';
import { processOrder } from '../execution/order-matcher.js';
import { logger } from '../logger.js';

export interface SimulationParams {
  makerFee: number;
  takerFee: number;
  balanceInit: number;
}

export class SimulationLoop {
  private position = 0;
  private balance: number;
  private openOrders: readonly OrderRequest[] = [];
  private lastClose: number | null = null;

  private readonly keys: BarKey[] = [];
  private readonly close: number[] = [];
  private readonly positionHistory: number[] = [];
  private readonly positionQuoteHistory: number[] = [];
  private readonly balanceQuoteHistory: number[] = [];
  private readonly equityQuoteHistory: number[] = [];
  private readonly finishedOrdersHistory: FinishedOrder[][] = [];

  constructor(
    private readonly strategy: Strategy,
    private readonly params: SimulationParams
  ) {
    this.balance = params.balanceInit;
    strategy.init?.();
  }

  step(bar: BarRecord): void {
    const finishedOrders = this.resolve(bar);

    const positionQuote = this.position * bar.open;
    const equity = this.balance + positionQuote;

    const snapshot: BarSnapshot = {
      index: bar.key,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      position: this.position,
      positionQuote,
      balanceQuote: this.balance,
      equityQuote: equity,
    };
    this.openOrders = Array.from(this.strategy.produceOrders(snapshot, bar));

    this.keys.push(bar.key);
    this.close.push(bar.close);
    this.positionHistory.push(this.position);
    this.positionQuoteHistory.push(positionQuote);
    this.balanceQuoteHistory.push(this.balance);
    this.equityQuoteHistory.push(equity);
    this.finishedOrdersHistory.push(finishedOrders);

    this.lastClose = bar.close;
  }

  private resolve(bar: BarRecord): FinishedOrder[] {
    const finishedOrders: FinishedOrder[] = [];
    // Nothing is carried into the first bar
    if (this.lastClose === null) {
      return finishedOrders;
    }

    for (const order of this.openOrders) {
      if (order.size === 0) {
        continue;
      }
      let finished: FinishedOrder;
      try {
        finished = processOrder(order, {
          lastClose: this.lastClose,
          high: bar.high,
          low: bar.low,
          makerFee: this.params.makerFee,
          takerFee: this.params.takerFee,
          timeIndex: bar.key,
        });
      } catch (error) {
        logger.error('Order resolution failed', error, { barKey: bar.key, order });
        throw error;
      }
      this.balance -= finished.balanceDecrement;
      if (isFilled(finished)) {
        this.position += order.size;
      }
      finishedOrders.push(finished);
    }
    return finishedOrders;
  }

  /**
   * Ledger accumulated so far (copies, the loop keeps running state)
   */
  toLedger(): Ledger {
    return {
      keys: [...this.keys],
      close: [...this.close],
      position: [...this.positionHistory],
      positionQuote: [...this.positionQuoteHistory],
      balanceQuote: [...this.balanceQuoteHistory],
      equityQuote: [...this.equityQuoteHistory],
      finishedOrders: this.finishedOrdersHistory.map((orders) => [...orders]),
    };
  }
}

/**
 * Run one shard from a fresh state to completion
 */
export function simulateShard(
  strategy: Strategy,
  bars: readonly BarRecord[],
  params: SimulationParams
): Ledger {
  const loop = new SimulationLoop(strategy, params);
  for (const bar of bars) {
    loop.step(bar);
  }
  return loop.toLedger();
}
