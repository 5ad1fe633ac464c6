/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition {
  /**
   * Command name (e.g., 'run')
   */
  name: string;

  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodTypeAny;

  /**
   * Validate raw options against the schema and call the handler
   */
  run(rawArgs: Record<string, unknown>, ctx: CommandContext): Promise<unknown>;

  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Command group name (e.g., 'backtest')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];
