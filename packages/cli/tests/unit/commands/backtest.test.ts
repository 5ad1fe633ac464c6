import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command } from 'commander';
import { commandRegistry } from '../../../src/core/command-registry.js';
import { coerceRunOptions, registerBacktestCommands } from '../../../src/commands/backtest.js';

describe('backtest commands', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('registers its definitions', () => {
    expect(commandRegistry.getCommand('backtest', 'run')?.name).toBe('run');
    expect(commandRegistry.getCommand('backtest', 'strategies')?.name).toBe('strategies');
  });

  it('coerces option values without renaming keys', () => {
    expect(
      coerceRunOptions({ csv: 'bars.csv', makerFee: '0.001', splits: '-1', linear: true })
    ).toEqual({ csv: 'bars.csv', makerFee: 0.001, splits: -1, linear: true });
  });

  it('adds the backtest command group once', () => {
    const program = new Command();
    registerBacktestCommands(program);
    registerBacktestCommands(program);

    expect(program.commands.map((cmd) => cmd.name())).toEqual(['backtest']);
    expect(program.commands[0].commands.map((cmd) => cmd.name())).toEqual(['run', 'strategies']);
  });

  it('runs through commander and prints to stdout', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const program = new Command();
    registerBacktestCommands(program);

    await program.parseAsync(['node', 'barreplay', 'backtest', 'strategies', '--format', 'csv']);

    expect(process.exitCode).toBe(0);
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0]).split('\n').slice(0, 2)).toEqual([
      'name,description',
      'idle,Never places an order',
    ]);
  });
});
