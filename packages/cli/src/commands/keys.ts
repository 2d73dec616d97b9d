/**
 * tierlru keys: list disk entries.
 */

import type { Command } from 'commander';

import { withDiskStore } from '../cache.js';
import { reportError, type CliContext, type GlobalOptions } from '../context.js';
import { formatOutput } from '../output/index.js';

export function registerKeysCommand(program: Command, context: CliContext): void {
  program
    .command('keys')
    .description('List disk entries with their sizes, least recently used first')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      try {
        const entries = await withDiskStore(context, options, (store) => store.entries());
        context.stdout(formatOutput(entries, options.format));
      } catch (err) {
        reportError(context, err);
      }
    });
}
