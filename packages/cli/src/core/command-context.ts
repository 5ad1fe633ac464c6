/**
 * Command Context - Lazy access to configuration
 *
 * Handlers read settings through the context so tests can supply their own
 * environment instead of process.env.
 */

import {
  getBacktestDefaults,
  loadConfigFromYaml,
  type AppConfig,
  type BacktestDefaults,
} from '@barreplay/utils';

export interface CommandContextOptions {
  env?: NodeJS.ProcessEnv;
}

export class CommandContext {
  private readonly env: NodeJS.ProcessEnv;
  private defaults: BacktestDefaults | null = null;

  constructor(options: CommandContextOptions = {}) {
    this.env = options.env ?? process.env;
  }

  /**
   * barreplay.yaml (or the given file); empty when absent
   */
  config(configPath?: string): AppConfig {
    return loadConfigFromYaml(configPath);
  }

  backtestDefaults(): BacktestDefaults {
    this.defaults ??= getBacktestDefaults(this.env);
    return this.defaults;
  }
}
