/**
 * Strategy Capability
 * ===================
 * The one external collaborator of the simulation loop.
 */

import type { BarKey, BarRecord } from './bar.js';
import type { OrderRequest } from './order.js';

/**
 * State handed to the strategy after a bar's orders were resolved
 */
export interface BarSnapshot {
  readonly index: BarKey;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly position: number;
  readonly positionQuote: number;
  readonly balanceQuote: number;
  readonly equityQuote: number;
}

export interface Strategy {
  readonly name?: string;

  /**
   * Optional hook, called once per shard before the first bar
   */
  init?(): void;

  /**
   * Orders to carry into the next bar. The returned sequence replaces every
   * order from the previous bar; an order that should stay alive has to be
   * issued again. Consumed eagerly and must be finite.
   */
  produceOrders(snapshot: BarSnapshot, bar: BarRecord): Iterable<OrderRequest>;
}

export type StrategyFactory = () => Strategy;

/**
 * A factory gives every shard its own instance
 */
export type StrategySource = Strategy | StrategyFactory;

export function resolveStrategy(source: StrategySource): Strategy {
  return typeof source === 'function' ? source() : source;
}
