/**
 * Command Registry - Command modules and their definitions
 */

import type { z } from 'zod';
import { ConfigurationError } from '@barreplay/utils';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import type { CommandContext } from './command-context.js';
import { parseArguments } from './argument-parser.js';

export interface TypedCommandSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  handler: (args: z.infer<S>, ctx: CommandContext) => Promise<unknown> | unknown;
  examples?: string[];
}

/**
 * Bind a handler to its schema: the handler only ever sees validated args
 */
export function defineCommand<S extends z.ZodTypeAny>(spec: TypedCommandSpec<S>): CommandDefinition {
  return {
    name: spec.name,
    description: spec.description,
    schema: spec.schema,
    examples: spec.examples,
    run: async (rawArgs, ctx) => spec.handler(parseArguments(spec.schema, rawArgs), ctx),
  };
}

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    this.packages.set(module.packageName, module);

    for (const command of module.commands) {
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  getPackageCommands(packageName: string): CommandDefinition[] {
    return this.packages.get(packageName)?.commands ?? [];
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }
}

export const commandRegistry = new CommandRegistry();
