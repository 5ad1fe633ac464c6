/**
 * YAML Configuration Loader
 * ==========================
 * Loads barreplay.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';

export const BacktestConfigSchema = z
  .object({
    makerFee: z.number().finite().optional(),
    takerFee: z.number().finite().optional(),
    balanceInit: z.number().finite().optional(),
    splits: z.number().int().optional(),
    logarithmic: z.boolean().optional(),
    name: z.string().optional(),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    backtest: BacktestConfigSchema.optional(),
  })
  .passthrough();

export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

const cachedConfigs = new Map<string, AppConfig>();

/**
 * Load configuration from a YAML file (default: ./barreplay.yaml)
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  const resolvedPath = configPath || join(process.cwd(), 'barreplay.yaml');
  const cached = cachedConfigs.get(resolvedPath);
  if (cached) {
    return cached;
  }

  if (!existsSync(resolvedPath)) {
    logger.debug('barreplay.yaml not found, using environment variables only', {
      path: resolvedPath,
    });
    cachedConfigs.set(resolvedPath, {});
    return {};
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    const config = AppConfigSchema.parse(load(content) ?? {});
    logger.info('Loaded configuration', { path: resolvedPath });
    cachedConfigs.set(resolvedPath, config);
    return config;
  } catch (error) {
    logger.warn('Failed to load configuration, using environment variables only', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfigs.set(resolvedPath, {});
    return {};
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfigs.clear();
}
