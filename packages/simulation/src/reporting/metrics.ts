/**
 * Performance Summary
 * ===================
 * Derived from the ledger series only; nothing here re-runs matching or
 * merging. Values that cannot be computed (too few bars, zero variance,
 * no orders) are null.
 */

import type { FinishedOrder, FinishedOrderState } from '../types/finished-order.js';
import { isFilled } from '../types/finished-order.js';
import type { BacktestResult, FeeRate } from '../types/ledger.js';
import { flattenFinishedOrders } from '../ledger/series.js';

const YEAR_MS = 365 * 24 * 60 * 60 * 1000;

export interface SummaryOptions {
  /**
   * Bars per year used for annualisation. Derived from the median key
   * spacing (keys read as epoch milliseconds) when omitted.
   */
  barsPerYear?: number;
}

export interface BacktestSummary {
  name: string | null;
  bars: number;
  /** Last key minus first key */
  period: number;
  startEquity: number | null;
  endEquity: number | null;
  winRatio: number | null;
  profitMean: number | null;
  profitMedian: number | null;
  profitStd: number | null;
  annualVolatility: number | null;
  sharpeRatio: number | null;
  sortinoRatio: number | null;
  maxDrawdown: number | null;
  makerFeeRate: FeeRate;
  takerFeeRate: FeeRate;
  totalFee: number;
  totalMakerFee: number;
  totalTakerFee: number;
  feeRatio: number | null;
  orderCount: number;
  totalOrderAmount: number;
  stateRatios: Record<FinishedOrderState, number | null>;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Sample standard deviation (n - 1)
 */
export function sampleStd(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) return null;
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Per-bar profit: fractional change in logarithmic mode, difference in linear mode
 */
export function profitSeries(equity: readonly number[], logarithmic: boolean): number[] {
  const profits: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    profits.push(logarithmic ? equity[i] / equity[i - 1] - 1 : equity[i] - equity[i - 1]);
  }
  return profits;
}

/**
 * Largest peak-to-trough fall: a fraction of the peak in logarithmic mode,
 * a quote amount in linear mode
 */
export function maxDrawdown(equity: readonly number[], logarithmic: boolean): number | null {
  if (equity.length === 0) return null;
  let peak = equity[0];
  let worst = 0;
  for (const value of equity) {
    peak = Math.max(peak, value);
    const drawdown = logarithmic ? (peak > 0 ? (peak - value) / peak : 0) : peak - value;
    worst = Math.max(worst, drawdown);
  }
  return worst;
}

/**
 * Fee paid by the account. Sell fills carry a negative fee, so the size
 * sign is applied back.
 */
export function feePaid(finished: FinishedOrder): number {
  return Math.sign(finished.order.size) * finished.fee;
}

function inferBarsPerYear(keys: readonly number[]): number | null {
  const spacing = median(keys.slice(1).map((key, i) => key - keys[i]));
  if (spacing === null || !(spacing > 0)) return null;
  return YEAR_MS / spacing;
}

function mulOrNull(value: number | null, factor: number | null): number | null {
  return value === null || factor === null ? null : value * factor;
}

function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

export function summarizeBacktest(
  result: BacktestResult,
  options: SummaryOptions = {}
): BacktestSummary {
  const { keys, equityQuote } = result.ledger;
  const first = equityQuote.length > 0 ? equityQuote[0] : null;
  const last = equityQuote.length > 0 ? equityQuote[equityQuote.length - 1] : null;

  const profits = profitSeries(equityQuote, result.logarithmic);
  const profitMean = mean(profits);
  const profitStd = sampleStd(profits);
  const downsideStd = sampleStd(profits.filter((p) => p < 0));
  const barsPerYear = options.barsPerYear ?? inferBarsPerYear(keys);
  const annualise = barsPerYear === null ? null : Math.sqrt(barsPerYear);

  const orders = flattenFinishedOrders(result.ledger);
  const filled = orders.filter(isFilled);
  const sumFees = (list: readonly FinishedOrder[]) =>
    list.reduce((sum, order) => sum + feePaid(order), 0);
  const totalFee = sumFees(filled);

  const stateRatio = (state: FinishedOrderState) =>
    orders.length === 0 ? null : orders.filter((o) => o.state === state).length / orders.length;

  return {
    name: result.name,
    bars: keys.length,
    period: keys.length > 0 ? keys[keys.length - 1] - keys[0] : 0,
    startEquity: first,
    endEquity: last,
    winRatio: profits.length === 0 ? null : profits.filter((p) => p > 0).length / profits.length,
    profitMean,
    profitMedian: median(profits),
    profitStd,
    annualVolatility: profitStd === null || annualise === null ? null : profitStd * annualise,
    sharpeRatio: mulOrNull(ratio(profitMean, profitStd), annualise),
    sortinoRatio: mulOrNull(ratio(profitMean, downsideStd), annualise),
    maxDrawdown: maxDrawdown(equityQuote, result.logarithmic),
    makerFeeRate: result.makerFeeRate,
    takerFeeRate: result.takerFeeRate,
    totalFee,
    totalMakerFee: sumFees(filled.filter((o) => o.state === 'FilledMaker')),
    totalTakerFee: sumFees(filled.filter((o) => o.state === 'FilledTaker')),
    feeRatio: first === null || last === null ? null : ratio(totalFee, last - first + totalFee),
    orderCount: orders.length,
    totalOrderAmount: orders.reduce((sum, o) => sum + Math.abs(o.quoteSize), 0),
    stateRatios: {
      FilledTaker: stateRatio('FilledTaker'),
      FilledMaker: stateRatio('FilledMaker'),
      CancelledNotFilled: stateRatio('CancelledNotFilled'),
      CancelledPostOnly: stateRatio('CancelledPostOnly'),
    },
  };
}

