/**
 * tierlru stats: tier sizes and capacities.
 */

import type { Command } from 'commander';

import { withCache } from '../cache.js';
import { reportError, type CliContext, type GlobalOptions } from '../context.js';
import { formatOutput } from '../output/index.js';

export function registerStatsCommand(program: Command, context: CliContext): void {
  program
    .command('stats')
    .description('Show tier sizes, capacities and counters for the cache directory')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      try {
        const stats = await withCache(context, options, (cache, config) => ({
          directory: config.directory,
          appVersion: config.appVersion,
          ...cache.getStats(),
        }));
        context.stdout(formatOutput(stats, options.format));
      } catch (err) {
        reportError(context, err);
      }
    });
}
