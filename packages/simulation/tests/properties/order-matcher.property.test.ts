/**
 * Property Tests for the Order Matcher
 * ====================================
 *
 * Invariants:
 * 1. Fills happen at the reference price (taker) or at the limit price (maker)
 * 2. Post-only orders never fill as taker
 * 3. balanceDecrement = quoteSize + sign(size) * fee
 * 4. Cancelled orders carry no amounts
 * 5. Zero-size orders are never matched
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { processOrder, type MatchContext } from '../../src/execution/order-matcher.js';
import { InvalidOrderError } from '@barreplay/utils';
import { isFilled } from '../../src/types/finished-order.js';
import type { OrderRequest } from '../../src/types/order.js';

const contextArb: fc.Arbitrary<MatchContext> = fc
  .record({
    lastClose: fc.double({ min: 1, max: 1000, noNaN: true }),
    spreadDown: fc.double({ min: 0, max: 0.5, noNaN: true }),
    spreadUp: fc.double({ min: 0, max: 0.5, noNaN: true }),
    makerFee: fc.double({ min: -0.001, max: 0.01, noNaN: true }),
    takerFee: fc.double({ min: 0, max: 0.01, noNaN: true }),
  })
  .map(({ lastClose, spreadDown, spreadUp, makerFee, takerFee }) => ({
    lastClose,
    low: lastClose * (1 - spreadDown),
    high: lastClose * (1 + spreadUp),
    makerFee,
    takerFee,
    timeIndex: 0,
  }));

const sizeArb = fc
  .double({ min: -100, max: 100, noNaN: true })
  .filter((size) => size !== 0);

function orderArb(lastClose: number): fc.Arbitrary<OrderRequest> {
  return fc.oneof(
    sizeArb.map((size): OrderRequest => ({ type: 'market', size })),
    fc
      .record({
        size: sizeArb,
        factor: fc.double({ min: 0.1, max: 2, noNaN: true }),
        postOnly: fc.boolean(),
      })
      .map(
        ({ size, factor, postOnly }): OrderRequest => ({
          type: 'limit',
          size,
          price: lastClose * factor,
          postOnly,
        })
      )
  );
}

const caseArb = contextArb.chain((ctx) => orderArb(ctx.lastClose).map((order) => ({ ctx, order })));

describe('Order Matcher - Property Tests', () => {
  it('fills at the reference price as taker or at the limit price as maker', () => {
    fc.assert(
      fc.property(caseArb, ({ ctx, order }) => {
        const finished = processOrder(order, ctx);
        if (finished.state === 'FilledTaker') {
          return finished.executedPrice === ctx.lastClose;
        }
        if (finished.state === 'FilledMaker') {
          return order.type === 'limit' && finished.executedPrice === order.price;
        }
        return finished.executedPrice === null;
      }),
      { numRuns: 500 }
    );
  });

  it('maker fills stay inside the bar range', () => {
    fc.assert(
      fc.property(caseArb, ({ ctx, order }) => {
        const finished = processOrder(order, ctx);
        if (finished.state !== 'FilledMaker' || finished.executedPrice === null) {
          return true;
        }
        return finished.executedPrice >= ctx.low && finished.executedPrice <= ctx.high;
      }),
      { numRuns: 500 }
    );
  });

  it('post-only orders never take liquidity', () => {
    fc.assert(
      fc.property(caseArb, ({ ctx, order }) => {
        const finished = processOrder(order, ctx);
        return !(order.type === 'limit' && order.postOnly && finished.state === 'FilledTaker');
      }),
      { numRuns: 500 }
    );
  });

  it('balance decrement is the quote size plus the fee paid', () => {
    fc.assert(
      fc.property(caseArb, ({ ctx, order }) => {
        const finished = processOrder(order, ctx);
        const expected = finished.quoteSize + Math.sign(order.size) * finished.fee;
        expect(finished.balanceDecrement).toBeCloseTo(expected, 6);
      }),
      { numRuns: 500 }
    );
  });

  it('cancelled orders carry no amounts', () => {
    fc.assert(
      fc.property(caseArb, ({ ctx, order }) => {
        const finished = processOrder(order, ctx);
        if (isFilled(finished)) {
          return finished.quoteSize === order.size * (finished.executedPrice ?? NaN);
        }
        return (
          finished.quoteSize === 0 && finished.fee === 0 && finished.balanceDecrement === 0
        );
      }),
      { numRuns: 500 }
    );
  });
});

describe('Order Matcher - zero-size orders', () => {
  it('refuses to match a zero-size order', () => {
    fc.assert(
      fc.property(contextArb, fc.boolean(), (ctx, market) => {
        const order: OrderRequest = market
          ? { type: 'market', size: 0 }
          : { type: 'limit', size: 0, price: ctx.lastClose, postOnly: false };
        expect(() => processOrder(order, ctx)).toThrow(InvalidOrderError);
      }),
      { numRuns: 100 }
    );
  });
});
