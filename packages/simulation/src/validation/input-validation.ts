/**
 * Input Validation
 * ================
 * Checked once, before any simulation. Every violated rule is collected and
 * reported together in one AggregateValidationError.
 */

import { z } from 'zod';
import { AggregateValidationError, ValidationError } from '@barreplay/utils';
import type { BarKey, BarRecord, BarTable, BarTableRow, RequiredBarColumn } from '../types/bar.js';
import { REQUIRED_BAR_COLUMNS } from '../types/bar.js';
import { getCpuCount } from '../engine/partitioner.js';
import { logger } from '../logger.js';

export const BacktestOptionsSchema = z.object({
  makerFee: z.number().finite(),
  takerFee: z.number().finite(),
  balanceInit: z.number().finite().default(1),
  splits: z.number().int().default(1),
  logarithmic: z.boolean().default(true),
  name: z.string().nullable().default(null),
  /** Upper bound on concurrently running shards; defaults to the core count */
  parallelWorkers: z.number().int().positive().optional(),
});

export type BacktestOptionsInput = z.input<typeof BacktestOptionsSchema>;
export type BacktestOptions = z.output<typeof BacktestOptionsSchema>;

export interface ValidatedBacktestInput {
  bars: BarRecord[];
  options: BacktestOptions;
}

const CAPITALISED: Record<RequiredBarColumn, string> = {
  open: 'Open',
  high: 'High',
  low: 'Low',
  close: 'Close',
};

function hasColumn(table: BarTable, column: string): boolean {
  return table.length > 0 && table.every((row) => row[column] !== undefined);
}

/**
 * Rename Open/High/Low/Close to lowercase when the lowercase set is absent
 */
export function normalizeColumns(table: BarTable): BarTable {
  if (REQUIRED_BAR_COLUMNS.every((column) => hasColumn(table, column))) {
    return table;
  }
  if (!REQUIRED_BAR_COLUMNS.every((column) => hasColumn(table, CAPITALISED[column]))) {
    return table;
  }
  return table.map((row) => {
    const normalized: Record<string, unknown> = { ...row };
    for (const column of REQUIRED_BAR_COLUMNS) {
      normalized[column] = row[CAPITALISED[column]];
      delete normalized[CAPITALISED[column]];
    }
    return normalized;
  });
}

function toNumber(value: unknown): number {
  return typeof value === 'number' ? value : NaN;
}

function toBar(row: BarTableRow): BarRecord {
  return {
    ...row,
    key: toNumber(row.key),
    open: toNumber(row.open),
    high: toNumber(row.high),
    low: toNumber(row.low),
    close: toNumber(row.close),
  };
}

function checkPrices(bars: readonly BarRecord[], errors: ValidationError[]): void {
  const some = (predicate: (bar: BarRecord) => boolean) => bars.some(predicate);
  const rule = (violated: boolean, message: string) => {
    if (violated) errors.push(new ValidationError(message));
  };

  rule(
    some((b) => ![b.open, b.high, b.low, b.close].every(Number.isFinite)),
    'prices must be finite numbers'
  );
  rule(some((b) => b.open > b.high), 'open price must be less than high price');
  rule(some((b) => b.open < b.low), 'open price must be greater than low price');
  rule(some((b) => b.close > b.high), 'close price must be less than high price');
  rule(some((b) => b.close < b.low), 'close price must be greater than low price');
  rule(some((b) => b.high < b.low), 'high price must be greater than low price');
  for (const column of ['open', 'close', 'high', 'low'] as const) {
    rule(some((b) => b[column] <= 0), `${column} price must be greater than 0`);
  }
}

function checkKeys(keys: readonly BarKey[], errors: ValidationError[]): void {
  if (!keys.every(Number.isFinite)) {
    errors.push(new ValidationError('index must be a finite number on every bar'));
    return;
  }
  let monotonic = true;
  for (let i = 1; i < keys.length; i++) {
    if (keys[i] < keys[i - 1]) {
      monotonic = false;
      break;
    }
  }
  if (!monotonic) {
    errors.push(new ValidationError('index must be monotonic increasing'));
  }
  if (new Set(keys).size !== keys.length) {
    errors.push(new ValidationError('index must be unique'));
  }
}

function checkSplits(splits: number, cpuCount: number, errors: ValidationError[]): void {
  if (splits === 0) {
    errors.push(new ValidationError('splits must be not 0', { splits }));
  } else if (splits < -cpuCount) {
    errors.push(
      new ValidationError(`splits must be greater than -cpuCount=${-cpuCount}`, {
        splits,
        cpuCount,
      })
    );
  }
}

/**
 * Normalize and validate a bar table and run options.
 *
 * @throws AggregateValidationError listing every violated rule
 */
export function validateBacktestInput(
  table: BarTable,
  options: BacktestOptionsInput,
  cpuCount: number = getCpuCount()
): ValidatedBacktestInput {
  const errors: ValidationError[] = [];

  const parsed = BacktestOptionsSchema.safeParse(options);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(
        new ValidationError(`${issue.path.join('.')}: ${issue.message}`, { issue: issue.code })
      );
    }
  } else {
    if (!(parsed.data.balanceInit > 0)) {
      errors.push(new ValidationError('balance_init must be greater than 0'));
    }
    checkSplits(parsed.data.splits, cpuCount, errors);
    if (!(parsed.data.takerFee > 0)) {
      logger.warn(`taker_fee is not positive (got ${parsed.data.takerFee}), are you sure?`, {
        takerFee: parsed.data.takerFee,
      });
    }
  }

  const normalized = normalizeColumns(table);
  const bars = normalized.map(toBar);

  if (normalized.length === 0) {
    errors.push(new ValidationError('table must contain at least one bar'));
  } else {
    const missing = REQUIRED_BAR_COLUMNS.filter((column) => !hasColumn(normalized, column));
    if (missing.length > 0) {
      errors.push(
        new ValidationError(
          `table must have columns "open", "close", "high", "low", missing ${missing.join(', ')}`,
          { missing }
        )
      );
    } else {
      checkPrices(bars, errors);
    }
    checkKeys(
      bars.map((bar) => bar.key),
      errors
    );
  }

  if (errors.length > 0 || !parsed.success) {
    const error = new AggregateValidationError(errors, { bars: normalized.length });
    logger.debug('Backtest input rejected', { violations: errors.length });
    throw error;
  }

  return { bars, options: parsed.data };
}
