/**
 * tierlru put / get / remove: single-entry operations.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { withCache } from '../cache.js';
import { reportError, type CliContext, type GlobalOptions } from '../context.js';
import { formatOutput } from '../output/index.js';

export function registerEntryCommands(program: Command, context: CliContext): void {
  program
    .command('put')
    .description('Store a UTF-8 value under key in both tiers')
    .argument('<key>', 'Cache key')
    .argument('<value>', 'Value to store')
    .action(async (key: string, value: string) => {
      const options = program.opts<GlobalOptions>();
      try {
        const previous = await withCache(context, options, (cache) => cache.put(key, value));
        context.stdout(formatOutput({ key, previous }, options.format));
      } catch (err) {
        reportError(context, err);
      }
    });

  program
    .command('get')
    .description('Print the value stored under key (exit code 1 when absent)')
    .argument('<key>', 'Cache key')
    .action(async (key: string) => {
      const options = program.opts<GlobalOptions>();
      try {
        const value = await withCache(context, options, (cache) => cache.get(key));
        if (value === null) {
          context.stderr(chalk.yellow(`Not found: ${key}`) + '\n');
          context.setExitCode(1);
          return;
        }
        context.stdout(formatOutput({ key, value }, options.format));
      } catch (err) {
        reportError(context, err);
      }
    });

  program
    .command('remove')
    .description('Remove key from both tiers')
    .argument('<key>', 'Cache key')
    .action(async (key: string) => {
      const options = program.opts<GlobalOptions>();
      try {
        const removed = await withCache(context, options, (cache) => {
          // A fresh process has an empty memory tier, so look through to disk first.
          const existed = cache.get(key) !== null;
          cache.remove(key);
          return existed;
        });
        context.stdout(formatOutput({ key, removed }, options.format));
      } catch (err) {
        reportError(context, err);
      }
    });
}
