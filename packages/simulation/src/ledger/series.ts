/**
 * Ledger Series
 * =============
 * Views and scaled copies of a ledger.
 */

import type { BarKey } from '../types/bar.js';
import { isFilled, scaleFinishedOrder, type FinishedOrder } from '../types/finished-order.js';
import type { Ledger, LedgerRow } from '../types/ledger.js';
import { assertScaleFactor } from '../types/order.js';

export function emptyLedger(): Ledger {
  return {
    keys: [],
    close: [],
    position: [],
    positionQuote: [],
    balanceQuote: [],
    equityQuote: [],
    finishedOrders: [],
  };
}

export function ledgerLength(ledger: Ledger): number {
  return ledger.keys.length;
}

export function ledgerRows(ledger: Ledger): LedgerRow[] {
  return ledger.keys.map((key, i) => ({
    key,
    close: ledger.close[i],
    position: ledger.position[i],
    positionQuote: ledger.positionQuote[i],
    balanceQuote: ledger.balanceQuote[i],
    equityQuote: ledger.equityQuote[i],
    finishedOrders: ledger.finishedOrders[i],
  }));
}

/**
 * Scaled copy: every amount (position, balances, equity, order sizes and fees)
 * is multiplied, close prices and keys are kept.
 */
export function scaleLedger(ledger: Ledger, factor: number): Ledger {
  assertScaleFactor(factor);
  const times = (values: readonly number[]) => values.map((v) => v * factor);
  return {
    keys: [...ledger.keys],
    close: [...ledger.close],
    position: times(ledger.position),
    positionQuote: times(ledger.positionQuote),
    balanceQuote: times(ledger.balanceQuote),
    equityQuote: times(ledger.equityQuote),
    finishedOrders: ledger.finishedOrders.map((orders) =>
      orders.map((order) => scaleFinishedOrder(order, factor))
    ),
  };
}

/**
 * Every finished order in time order
 */
export function flattenFinishedOrders(ledger: Ledger): FinishedOrder[] {
  return ledger.finishedOrders.flat();
}

export interface KeyedValue<T> {
  key: BarKey;
  value: T;
}

export function orderCountSeries(ledger: Ledger): KeyedValue<number>[] {
  return ledger.keys.map((key, i) => ({ key, value: ledger.finishedOrders[i].length }));
}

/**
 * Share of resolved orders that filled on each bar; null when nothing resolved
 */
export function filledRateSeries(ledger: Ledger): KeyedValue<number | null>[] {
  return ledger.keys.map((key, i) => {
    const orders = ledger.finishedOrders[i];
    if (orders.length === 0) {
      return { key, value: null };
    }
    return { key, value: orders.filter(isFilled).length / orders.length };
  });
}
