/**
 * Backtest Run Handler
 *
 * Resolves run settings (flags > barreplay.yaml > environment > defaults),
 * loads the CSV, replays the strategy preset and returns either the
 * performance summary or the ledger rows.
 */

import { ConfigurationError } from '@barreplay/utils';
import {
  getStrategyPreset,
  ledgerRows,
  loadBarsFromCsv,
  runBacktest,
  summarizeBacktest,
  type BacktestResult,
  type BacktestSummary,
  type FeeRate,
} from '@barreplay/simulation';
import type { BacktestRunArgs } from '../../command-defs/backtest.js';
import type { CommandContext } from '../../core/command-context.js';

export type SummaryRecord = Record<string, string | number | null>;

export interface LedgerRecord {
  key: number;
  close: number;
  position: number;
  positionQuote: number;
  balanceQuote: number;
  equityQuote: number;
  orders: number;
  filled: number;
}

function feeRateValue(rate: FeeRate): string | number {
  return rate.kind === 'fixed' ? rate.rate : 'mixed';
}

/**
 * Flat summary suitable for table and CSV output
 */
export function toSummaryRecord(summary: BacktestSummary): SummaryRecord {
  const { stateRatios, makerFeeRate, takerFeeRate, ...scalars } = summary;
  return {
    ...scalars,
    makerFeeRate: feeRateValue(makerFeeRate),
    takerFeeRate: feeRateValue(takerFeeRate),
    stateFilledMaker: stateRatios.FilledMaker,
    stateFilledTaker: stateRatios.FilledTaker,
    stateCancelledNotFilled: stateRatios.CancelledNotFilled,
    stateCancelledPostOnly: stateRatios.CancelledPostOnly,
  };
}

export function toLedgerRecords(result: BacktestResult): LedgerRecord[] {
  return ledgerRows(result.ledger).map((row) => ({
    key: row.key,
    close: row.close,
    position: row.position,
    positionQuote: row.positionQuote,
    balanceQuote: row.balanceQuote,
    equityQuote: row.equityQuote,
    orders: row.finishedOrders.length,
    filled: row.finishedOrders.filter((o) => o.executedPrice !== null).length,
  }));
}

export async function runBacktestHandler(
  args: BacktestRunArgs,
  ctx: CommandContext
): Promise<SummaryRecord | LedgerRecord[]> {
  const config = ctx.config(args.config).backtest ?? {};
  const defaults = ctx.backtestDefaults();

  const makerFee = args.makerFee ?? config.makerFee ?? defaults.makerFee;
  const takerFee = args.takerFee ?? config.takerFee ?? defaults.takerFee;
  if (makerFee === undefined || takerFee === undefined) {
    throw new ConfigurationError(
      'Maker and taker fees are required: pass --maker-fee and --taker-fee, set them in barreplay.yaml, or export BACKTEST_MAKER_FEE and BACKTEST_TAKER_FEE',
      makerFee === undefined ? 'makerFee' : 'takerFee'
    );
  }

  const preset = getStrategyPreset(args.strategy);
  const table = await loadBarsFromCsv(args.csv);

  const result = await runBacktest(preset.create, table, {
    makerFee,
    takerFee,
    balanceInit: args.balanceInit ?? config.balanceInit ?? defaults.balanceInit,
    splits: args.splits ?? config.splits ?? defaults.splits,
    logarithmic: args.linear === true ? false : config.logarithmic ?? defaults.logarithmic,
    name: args.name ?? config.name ?? preset.name,
  });

  if (args.ledger) {
    return toLedgerRecords(result);
  }
  return toSummaryRecord(summarizeBacktest(result, { barsPerYear: args.barsPerYear }));
}
