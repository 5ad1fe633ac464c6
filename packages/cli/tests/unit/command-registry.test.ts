import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from '@barreplay/utils';
import { CommandRegistry, defineCommand } from '../../src/core/command-registry.js';
import { CommandContext } from '../../src/core/command-context.js';

const echo = defineCommand({
  name: 'echo',
  description: 'Echo a number',
  schema: z.object({ n: z.number() }),
  handler: (args) => ({ doubled: args.n * 2 }),
});

describe('defineCommand', () => {
  it('validates arguments before calling the handler', async () => {
    const ctx = new CommandContext({ env: {} });

    await expect(echo.run({ n: 4 }, ctx)).resolves.toEqual({ doubled: 8 });
    await expect(echo.run({ n: 'four' }, ctx)).rejects.toThrow(ValidationError);
  });
});

describe('CommandRegistry', () => {
  it('looks commands up by package and name', () => {
    const registry = new CommandRegistry();
    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [echo] });

    expect(registry.getCommand('demo', 'echo')).toBe(echo);
    expect(registry.getCommand('demo', 'missing')).toBeUndefined();
    expect(registry.getPackageCommands('demo')).toEqual([echo]);
    expect(registry.getPackages().map((p) => p.packageName)).toEqual(['demo']);
  });

  it('rejects duplicate packages and commands', () => {
    const registry = new CommandRegistry();
    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [echo] });

    expect(() =>
      registry.registerPackage({ packageName: 'demo', description: 'Again', commands: [] })
    ).toThrow(ConfigurationError);
    expect(() =>
      registry.registerPackage({ packageName: 'twice', description: 'Twice', commands: [echo, echo] })
    ).toThrow('Command twice.echo is already registered');
  });
});

describe('CommandContext', () => {
  it('reads defaults from the given environment once', () => {
    const env: NodeJS.ProcessEnv = { BACKTEST_SPLITS: '3' };
    const ctx = new CommandContext({ env });

    expect(ctx.backtestDefaults().splits).toBe(3);
    env.BACKTEST_SPLITS = '5';
    expect(ctx.backtestDefaults().splits).toBe(3);
  });
});
