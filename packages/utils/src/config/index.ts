/**
 * Configuration loading from environment variables
 */

import { ConfigurationError } from '../errors.js';

export interface BacktestDefaults {
  makerFee?: number;
  takerFee?: number;
  balanceInit: number;
  splits: number;
  logarithmic: boolean;
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a finite number, got '${raw}'`, key);
  }
  return value;
}

function readInteger(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = readNumber(env, key);
  if (value !== undefined && !Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got '${value}'`, key);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const lower = raw.trim().toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  throw new ConfigurationError(`${key} must be a boolean, got '${raw}'`, key);
}

/**
 * Load backtest defaults from environment variables
 */
export function getBacktestDefaults(env: NodeJS.ProcessEnv = process.env): BacktestDefaults {
  return {
    makerFee: readNumber(env, 'BACKTEST_MAKER_FEE'),
    takerFee: readNumber(env, 'BACKTEST_TAKER_FEE'),
    balanceInit: readNumber(env, 'BACKTEST_BALANCE_INIT') ?? 1,
    splits: readInteger(env, 'BACKTEST_SPLITS') ?? 1,
    logarithmic: readBoolean(env, 'BACKTEST_LOGARITHMIC') ?? true,
  };
}

export * from './yaml-config.js';
