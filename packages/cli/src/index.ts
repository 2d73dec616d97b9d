/**
 * tierlru: command-line access to a two-level cache directory.
 */

import { Command, InvalidArgumentError, Option } from 'commander';

import { registerClearCommand } from './commands/clear.js';
import { registerEntryCommands } from './commands/entries.js';
import { registerKeysCommand } from './commands/keys.js';
import { registerStatsCommand } from './commands/stats.js';
import { createProcessContext, type CliContext } from './context.js';
import { OUTPUT_FORMATS } from './output/index.js';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Build the CLI program. Commands write through context, so the program
 * can run in-process.
 */
export function createProgram(context: CliContext = createProcessContext()): Command {
  const program = new Command('tierlru');

  program
    .description('Inspect and manage a tierlru cache directory')
    .version('0.1.0')
    .option('-d, --dir <directory>', 'Cache directory (default: TIERLRU_DIRECTORY or tierlru.config.json)')
    .option('--app-version <version>', 'Store format version', parseInteger)
    .option('--max-memory <size>', 'Memory tier capacity in entries', parseInteger)
    .option('--max-disk <bytes>', 'Disk tier capacity in bytes', parseInteger)
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('table')
    )
    .configureOutput({
      writeOut: (text) => context.stdout(text),
      writeErr: (text) => context.stderr(text),
    });

  registerEntryCommands(program, context);
  registerKeysCommand(program, context);
  registerStatsCommand(program, context);
  registerClearCommand(program, context);

  return program;
}

export { type CliContext, type GlobalOptions, createProcessContext } from './context.js';
export { formatOutput, type OutputFormat } from './output/index.js';
