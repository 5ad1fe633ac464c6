/**
 * Order Matcher
 * =============
 * Pure fill decision for one pending order against one bar.
 *
 * The reference price is the previous bar's close. A buy priced at or above
 * it is marketable and fills as taker at the reference price (or is rejected
 * when post-only); below it, the order rests and fills as maker at its own
 * price if the bar's low reaches it. Sells mirror this against the high.
 */

import { InvalidOrderError } from '@barreplay/utils';
import type { BarKey } from '../types/bar.js';
import type { FinishedOrder } from '../types/finished-order.js';
import type { LimitOrder, OrderRequest } from '../types/order.js';

export interface MatchContext {
  lastClose: number;
  high: number;
  low: number;
  makerFee: number;
  takerFee: number;
  timeIndex: BarKey;
}

/**
 * Market orders become limit orders priced to always cross the reference price
 */
export function toLimitOrder(order: OrderRequest, lastClose: number): LimitOrder {
  switch (order.type) {
    case 'limit':
      return order;
    case 'market': {
      let price = lastClose;
      if (order.size > 0) {
        price = lastClose * 2;
      } else if (order.size < 0) {
        price = lastClose / 2;
      }
      return { type: 'limit', size: order.size, price, postOnly: false };
    }
  }
}

function cancelled(
  order: OrderRequest,
  timeIndex: BarKey,
  state: 'CancelledNotFilled' | 'CancelledPostOnly'
): FinishedOrder {
  return {
    timeIndex,
    order,
    balanceDecrement: 0,
    fee: 0,
    executedPrice: null,
    quoteSize: 0,
    state,
  };
}

function filled(
  order: OrderRequest,
  timeIndex: BarKey,
  price: number,
  feeRate: number,
  side: 1 | -1,
  state: 'FilledTaker' | 'FilledMaker'
): FinishedOrder {
  const quoteSize = order.size * price;
  return {
    timeIndex,
    order,
    balanceDecrement: quoteSize * (1 + side * feeRate),
    // Sign follows size, so a sell's fee is negative
    fee: quoteSize * feeRate,
    executedPrice: price,
    quoteSize,
    state,
  };
}

export function processBuyOrder(order: OrderRequest, ctx: MatchContext): FinishedOrder {
  if (!(order.size > 0)) {
    throw new InvalidOrderError('Buy order size must be positive', {
      order,
      barKey: ctx.timeIndex,
    });
  }
  const limit = toLimitOrder(order, ctx.lastClose);

  if (limit.price >= ctx.lastClose) {
    if (limit.postOnly) {
      return cancelled(order, ctx.timeIndex, 'CancelledPostOnly');
    }
    return filled(order, ctx.timeIndex, ctx.lastClose, ctx.takerFee, 1, 'FilledTaker');
  }
  if (limit.price >= ctx.low) {
    return filled(order, ctx.timeIndex, limit.price, ctx.makerFee, 1, 'FilledMaker');
  }
  return cancelled(order, ctx.timeIndex, 'CancelledNotFilled');
}

export function processSellOrder(order: OrderRequest, ctx: MatchContext): FinishedOrder {
  if (!(order.size < 0)) {
    throw new InvalidOrderError('Sell order size must be negative', {
      order,
      barKey: ctx.timeIndex,
    });
  }
  const limit = toLimitOrder(order, ctx.lastClose);

  if (limit.price <= ctx.lastClose) {
    if (limit.postOnly) {
      return cancelled(order, ctx.timeIndex, 'CancelledPostOnly');
    }
    return filled(order, ctx.timeIndex, ctx.lastClose, ctx.takerFee, -1, 'FilledTaker');
  }
  if (limit.price <= ctx.high) {
    return filled(order, ctx.timeIndex, limit.price, ctx.makerFee, -1, 'FilledMaker');
  }
  return cancelled(order, ctx.timeIndex, 'CancelledNotFilled');
}

/**
 * Route an order to the buy or sell handler. Zero-size orders are a caller
 * error: the simulation loop filters them out before matching.
 */
export function processOrder(order: OrderRequest, ctx: MatchContext): FinishedOrder {
  if (order.size > 0) {
    return processBuyOrder(order, ctx);
  }
  if (order.size < 0) {
    return processSellOrder(order, ctx);
  }
  throw new InvalidOrderError('Order size must be non-zero', { order, barKey: ctx.timeIndex });
}
