/**
 * Ledger Types
 * ============
 * Time-aligned output of a run, stored as parallel columns so reporting
 * collaborators can consume each series independently.
 */

import type { BarKey } from './bar.js';
import type { FinishedOrder } from './finished-order.js';

export interface Ledger {
  readonly keys: readonly BarKey[];
  readonly close: readonly number[];
  readonly position: readonly number[];
  readonly positionQuote: readonly number[];
  readonly balanceQuote: readonly number[];
  /** balanceQuote + position * open */
  readonly equityQuote: readonly number[];
  readonly finishedOrders: readonly (readonly FinishedOrder[])[];
}

export interface LedgerRow {
  readonly key: BarKey;
  readonly close: number;
  readonly position: number;
  readonly positionQuote: number;
  readonly balanceQuote: number;
  readonly equityQuote: number;
  readonly finishedOrders: readonly FinishedOrder[];
}

/**
 * Fee rate reported on a result; merged runs with differing rates are 'mixed'
 */
export type FeeRate = { readonly kind: 'fixed'; readonly rate: number } | { readonly kind: 'mixed' };

export interface BacktestResult {
  readonly name: string | null;
  readonly ledger: Ledger;
  readonly makerFeeRate: FeeRate;
  readonly takerFeeRate: FeeRate;
  readonly logarithmic: boolean;
  readonly balanceInit: number;
}
