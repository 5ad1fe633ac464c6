/**
 * Strategy Presets
 *
 * Small reference strategies, registered by name for the CLI.
 * Each preset is a factory so every shard gets a fresh instance.
 */

import { NotFoundError } from '@barreplay/utils';
import { limitOrder, marketOrder, type OrderRequest } from '../types/order.js';
import type { BarSnapshot, Strategy, StrategyFactory } from '../types/strategy.js';

/**
 * Never places an order
 */
export function idle(): Strategy {
  return {
    name: 'idle',
    produceOrders: () => [],
  };
}

/**
 * Market buy and market sell of one quote unit every bar
 */
export function marketRoundTrip(): Strategy {
  return {
    name: 'market-round-trip',
    produceOrders: (snapshot) => [
      marketOrder(1 / snapshot.close),
      marketOrder(-1 / snapshot.close),
    ],
  };
}

export interface PostOnlyBandOptions {
  /** Distance from the close as a fraction of the close */
  offset?: number;
  size?: number;
}

/**
 * Post-only bid below and ask above the close
 */
export function postOnlyBand(options: PostOnlyBandOptions = {}): Strategy {
  const offset = options.offset ?? 0.01;
  const size = options.size ?? 1;
  return {
    name: 'post-only-band',
    produceOrders: (snapshot) => [
      limitOrder(size, snapshot.close * (1 - offset), true),
      limitOrder(-size, snapshot.close * (1 + offset), true),
    ],
  };
}

export function simpleMovingAverage(values: readonly number[], period: number): number | null {
  if (values.length < period) {
    return null;
  }
  let sum = 0;
  for (let i = values.length - period; i < values.length; i++) {
    sum += values[i];
  }
  return sum / period;
}

export interface SmaCrossOptions {
  fast?: number;
  slow?: number;
}

/**
 * Long one unit while the fast SMA is above the slow one, flat otherwise
 */
export function smaCross(options: SmaCrossOptions = {}): Strategy {
  const fast = options.fast ?? 5;
  const slow = options.slow ?? 20;
  let closes: number[] = [];

  return {
    name: 'sma-cross',
    init() {
      closes = [];
    },
    produceOrders(snapshot: BarSnapshot): OrderRequest[] {
      closes.push(snapshot.close);
      if (closes.length > slow) {
        closes.shift();
      }
      const fastAvg = simpleMovingAverage(closes, fast);
      const slowAvg = simpleMovingAverage(closes, slow);
      if (fastAvg === null || slowAvg === null) {
        return [];
      }
      if (fastAvg > slowAvg && snapshot.position < 1) {
        return [marketOrder(1 - snapshot.position)];
      }
      if (fastAvg < slowAvg && snapshot.position > 0) {
        return [marketOrder(-snapshot.position)];
      }
      return [];
    },
  };
}

export type StrategyPresetName = 'idle' | 'market-round-trip' | 'post-only-band' | 'sma-cross';

export interface StrategyPreset {
  name: StrategyPresetName;
  description: string;
  create: StrategyFactory;
}

const presets: Map<StrategyPresetName, StrategyPreset> = new Map();

presets.set('idle', {
  name: 'idle',
  description: 'Never places an order',
  create: idle,
});

presets.set('market-round-trip', {
  name: 'market-round-trip',
  description: 'Market buy and sell of one quote unit every bar',
  create: marketRoundTrip,
});

presets.set('post-only-band', {
  name: 'post-only-band',
  description: 'Post-only bid and ask 1% around the close',
  create: () => postOnlyBand(),
});

presets.set('sma-cross', {
  name: 'sma-cross',
  description: 'Long one unit while SMA(5) is above SMA(20)',
  create: () => smaCross(),
});

export function listStrategyPresets(): StrategyPreset[] {
  return Array.from(presets.values());
}

export function getStrategyPreset(name: string): StrategyPreset {
  const preset = listStrategyPresets().find((p) => p.name === name);
  if (!preset) {
    throw new NotFoundError('Strategy preset', name, {
      available: listStrategyPresets().map((p) => p.name),
    });
  }
  return preset;
}
