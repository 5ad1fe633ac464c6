/**
 * Backtest Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandRegistry, defineCommand } from '../core/command-registry.js';
import { coerceBoolean, coerceInteger, coerceNumber } from '../core/coerce.js';
import { execute } from '../core/execute.js';
import { backtestRunSchema, backtestStrategiesSchema } from '../command-defs/backtest.js';
import { runBacktestHandler } from '../handlers/backtest/run-backtest.js';
import { listStrategiesHandler } from '../handlers/backtest/list-strategies.js';

/**
 * Value coercion for `backtest run`; keys stay as Commander produced them
 */
export function coerceRunOptions(raw: Record<string, unknown>): Record<string, unknown> {
  return {
    ...raw,
    makerFee: coerceNumber(raw.makerFee, 'maker-fee'),
    takerFee: coerceNumber(raw.takerFee, 'taker-fee'),
    balanceInit: coerceNumber(raw.balanceInit, 'balance-init'),
    splits: coerceInteger(raw.splits, 'splits'),
    barsPerYear: coerceNumber(raw.barsPerYear, 'bars-per-year'),
    linear: coerceBoolean(raw.linear, 'linear'),
    ledger: coerceBoolean(raw.ledger, 'ledger'),
  };
}

const backtestModule: PackageCommandModule = {
  packageName: 'backtest',
  description: 'Replay strategies over OHLC bars',
  commands: [
    defineCommand({
      name: 'run',
      description: 'Run a strategy preset over a CSV of bars',
      schema: backtestRunSchema,
      handler: runBacktestHandler,
      examples: [
        'barreplay backtest run --csv bars.csv --strategy sma-cross --maker-fee 0.001 --taker-fee 0.002',
        'barreplay backtest run --csv bars.csv --strategy post-only-band --splits -1 --linear --format json',
        'barreplay backtest run --csv bars.csv --strategy idle --ledger --format csv',
      ],
    }),
    defineCommand({
      name: 'strategies',
      description: 'List strategy presets',
      schema: backtestStrategiesSchema,
      handler: listStrategiesHandler,
      examples: ['barreplay backtest strategies'],
    }),
  ],
};

commandRegistry.registerPackage(backtestModule);

async function runRegistered(commandName: string, options: Record<string, unknown>): Promise<void> {
  const commandDef = commandRegistry.getCommand('backtest', commandName);
  if (!commandDef) {
    throw new Error(`Command backtest.${commandName} not found in registry`);
  }
  process.exitCode = await execute(commandDef, options);
}

/**
 * Register backtest commands
 */
export function registerBacktestCommands(program: Command): void {
  if (program.commands.find((cmd) => cmd.name() === 'backtest')) {
    return;
  }

  const backtestCmd = program.command('backtest').description(backtestModule.description);

  backtestCmd
    .command('run')
    .description('Run a strategy preset over a CSV of bars')
    .requiredOption('--csv <path>', 'CSV file with a timestamp/time/date/index column and OHLC')
    .requiredOption('--strategy <name>', 'Strategy preset (see `backtest strategies`)')
    .option('--maker-fee <rate>', 'Maker fee rate')
    .option('--taker-fee <rate>', 'Taker fee rate')
    .option('--balance-init <amount>', 'Initial quote balance')
    .option('--splits <n>', 'Shard count; negative is relative to the CPU count')
    .option('--linear', 'Linear instead of logarithmic compounding across shards')
    .option('--name <name>', 'Run name')
    .option('--ledger', 'Print ledger rows instead of the summary')
    .option('--bars-per-year <n>', 'Bars per year for annualised metrics')
    .option('--config <path>', 'Config file (default: ./barreplay.yaml)')
    .option('--format <format>', 'Output format (json, table, csv)', 'table')
    .action(async (options: Record<string, unknown>) => {
      await runRegistered('run', coerceRunOptions(options));
    });

  backtestCmd
    .command('strategies')
    .description('List strategy presets')
    .option('--format <format>', 'Output format (json, table, csv)', 'table')
    .action(async (options: Record<string, unknown>) => {
      await runRegistered('strategies', options);
    });
}
