/**
 * Command Executor
 *
 * Handles the universal part of every command:
 * - Normalize options
 * - Validate and call the handler
 * - Format output
 * - Error handling
 */

import { logger } from '@barreplay/utils';
import type { CommandDefinition, OutputFormat } from '../types/index.js';
import { OUTPUT_FORMATS } from '../types/index.js';
import { normalizeOptions } from './argument-parser.js';
import { CommandContext } from './command-context.js';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';

export interface ExecuteIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: ExecuteIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function outputFormat(value: unknown): OutputFormat {
  return OUTPUT_FORMATS.find((format) => format === value) ?? 'table';
}

/**
 * Run a command and print its result. Returns the process exit code.
 */
export async function execute(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  ctx: CommandContext = new CommandContext(),
  io: ExecuteIO = defaultIO
): Promise<number> {
  const options = normalizeOptions(rawOptions);
  try {
    logger.debug('Executing command', { command: commandDef.name });
    const result = await commandDef.run(options, ctx);
    io.stdout(formatOutput(result, outputFormat(options.format)));
    return 0;
  } catch (error) {
    for (const line of handleError(error, { command: commandDef.name })) {
      io.stderr(line);
    }
    return 1;
  }
}
