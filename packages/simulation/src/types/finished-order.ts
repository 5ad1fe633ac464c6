/**
 * Finished Orders
 * ===============
 * Terminal outcome of one resolution attempt. Every carried order ends up
 * here exactly once: filled (maker or taker) or cancelled.
 */

import type { BarKey } from './bar.js';
import { assertScaleFactor, scaleOrder, type OrderRequest } from './order.js';

export type FinishedOrderState =
  | 'FilledTaker'
  | 'FilledMaker'
  | 'CancelledNotFilled'
  | 'CancelledPostOnly';

export const FINISHED_ORDER_STATES: readonly FinishedOrderState[] = [
  'FilledTaker',
  'FilledMaker',
  'CancelledNotFilled',
  'CancelledPostOnly',
];

export interface FinishedOrder {
  readonly timeIndex: BarKey;
  readonly order: OrderRequest;
  /** Subtracted from balance; negative for sells */
  readonly balanceDecrement: number;
  readonly fee: number;
  readonly executedPrice: number | null;
  readonly quoteSize: number;
  readonly state: FinishedOrderState;
}

export function isFilled(finished: Pick<FinishedOrder, 'state'>): boolean {
  return finished.state === 'FilledTaker' || finished.state === 'FilledMaker';
}

/**
 * Scaled copy; the executed price is a price, not an amount, so it is kept
 */
export function scaleFinishedOrder(finished: FinishedOrder, factor: number): FinishedOrder {
  assertScaleFactor(factor);
  return {
    ...finished,
    order: scaleOrder(finished.order, factor),
    balanceDecrement: finished.balanceDecrement * factor,
    quoteSize: finished.quoteSize * factor,
    fee: finished.fee * factor,
  };
}
