/**
 * tierlru clear: wipe the cache directory.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { withCache } from '../cache.js';
import { reportError, type CliContext, type GlobalOptions } from '../context.js';

export function registerClearCommand(program: Command, context: CliContext): void {
  program
    .command('clear')
    .description('Delete every entry and every file in the cache directory')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      try {
        const directory = await withCache(context, options, (cache, config) => {
          cache.evictAll();
          return config.directory;
        });
        context.stdout(chalk.green(`Cleared ${directory}`) + '\n');
      } catch (err) {
        reportError(context, err);
      }
    });
}
