import { listStrategyPresets } from '@barreplay/simulation';
import type { BacktestStrategiesArgs } from '../../command-defs/backtest.js';

export interface StrategyListing {
  name: string;
  description: string;
}

export async function listStrategiesHandler(
  _args: BacktestStrategiesArgs
): Promise<StrategyListing[]> {
  return listStrategyPresets().map(({ name, description }) => ({ name, description }));
}
