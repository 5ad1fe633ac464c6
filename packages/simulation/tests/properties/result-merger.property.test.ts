/**
 * Property Tests for the Result Merger
 * ====================================
 *
 * Invariants:
 * 1. Merging is associative in both compounding modes
 * 2. The earlier segment of a merged curve is left untouched when the later
 *    run opens at its initial balance
 * 3. Keys are the ordered union of both inputs
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { mergeResults } from '../../src/engine/result-merger.js';
import type { BacktestResult, Ledger } from '../../src/types/ledger.js';

function ledgerFrom(start: number, equity: readonly number[]): Ledger {
  return {
    keys: equity.map((_, i) => start + i),
    close: equity.map(() => 10),
    position: equity.map((value) => value / 20),
    positionQuote: equity.map((value) => value / 2),
    balanceQuote: equity.map((value) => value / 2),
    equityQuote: [...equity],
    finishedOrders: equity.map(() => []),
  };
}

function resultFrom(
  start: number,
  equity: readonly number[],
  logarithmic: boolean,
  balanceInit: number
): BacktestResult {
  return {
    name: `from ${start}`,
    ledger: ledgerFrom(start, equity),
    makerFeeRate: { kind: 'fixed', rate: 0.001 },
    takerFeeRate: { kind: 'fixed', rate: 0.002 },
    logarithmic,
    balanceInit,
  };
}

const curveArb = fc.array(fc.double({ min: 1, max: 100, noNaN: true }), {
  minLength: 1,
  maxLength: 5,
});

const tripleArb = fc.record({
  a: curveArb,
  b: curveArb,
  c: curveArb,
  logarithmic: fc.boolean(),
  balanceInit: fc.double({ min: 1, max: 50, noNaN: true }),
});

function expectClose(actual: readonly number[], expected: readonly number[]): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => {
    const scale = Math.max(1, Math.abs(expected[i]));
    expect(Math.abs(value - expected[i]) / scale).toBeLessThan(1e-9);
  });
}

describe('Result Merger - Property Tests', () => {
  it('is associative', () => {
    fc.assert(
      fc.property(tripleArb, ({ a, b, c, logarithmic, balanceInit }) => {
        const ra = resultFrom(0, a, logarithmic, balanceInit);
        const rb = resultFrom(10, b, logarithmic, balanceInit);
        const rc = resultFrom(20, c, logarithmic, balanceInit);

        const left = mergeResults(mergeResults(ra, rb), rc);
        const right = mergeResults(ra, mergeResults(rb, rc));

        expect(left.ledger.keys).toEqual(right.ledger.keys);
        expect(left.name).toBe(right.name);
        expectClose(left.ledger.equityQuote, right.ledger.equityQuote);
        expectClose(left.ledger.balanceQuote, right.ledger.balanceQuote);
        expectClose(left.ledger.position, right.ledger.position);
        expectClose(left.ledger.positionQuote, right.ledger.positionQuote);
      }),
      { numRuns: 200 }
    );
  });

  it('keeps the earlier equity curve unchanged', () => {
    fc.assert(
      fc.property(tripleArb, ({ a, b, logarithmic, balanceInit }) => {
        // A fresh linear run opens at its initial balance
        const later = logarithmic ? b : [balanceInit, ...b.slice(1)];
        const merged = mergeResults(
          resultFrom(0, a, logarithmic, balanceInit),
          resultFrom(10, later, logarithmic, balanceInit)
        );
        expectClose(merged.ledger.equityQuote.slice(0, a.length), a);
      }),
      { numRuns: 200 }
    );
  });

  it('aligns on the ordered union of keys', () => {
    fc.assert(
      fc.property(tripleArb, ({ a, b, logarithmic, balanceInit }) => {
        const merged = mergeResults(
          resultFrom(0, a, logarithmic, balanceInit),
          resultFrom(10, b, logarithmic, balanceInit)
        );
        expect(merged.ledger.keys).toEqual([
          ...a.map((_, i) => i),
          ...b.map((_, i) => 10 + i),
        ]);
      }),
      { numRuns: 100 }
    );
  });
});
