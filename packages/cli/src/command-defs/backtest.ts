import { z } from 'zod';

/**
 * Backtest run schema. Fee, balance and split values left out here fall
 * back to barreplay.yaml, then to BACKTEST_* environment variables.
 */
export const backtestRunSchema = z.object({
  csv: z.string().min(1, 'CSV path is required'),
  strategy: z.string().min(1, 'Strategy preset is required'),
  makerFee: z.number().finite().optional(),
  takerFee: z.number().finite().optional(),
  balanceInit: z.number().finite().optional(),
  splits: z.number().int().optional(),
  linear: z.boolean().optional(),
  name: z.string().optional(),
  ledger: z.boolean().optional().default(false),
  barsPerYear: z.number().positive().optional(),
  config: z.string().optional(),
  format: z.enum(['json', 'table', 'csv']).optional().default('table'),
});

export type BacktestRunArgs = z.infer<typeof backtestRunSchema>;

/**
 * Strategy preset listing schema
 */
export const backtestStrategiesSchema = z.object({
  format: z.enum(['json', 'table', 'csv']).optional().default('table'),
});

export type BacktestStrategiesArgs = z.infer<typeof backtestStrategiesSchema>;
