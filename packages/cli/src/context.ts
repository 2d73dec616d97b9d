/**
 * CLI context: the process surface commands write to.
 */

import chalk from 'chalk';
import { toError } from 'tierlru-core';

import type { OutputFormat } from './output/index.js';

export interface CliContext {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Options accepted on the root program
 */
export type GlobalOptions = {
  dir?: string;
  appVersion?: number;
  maxMemory?: number;
  maxDisk?: number;
  format: OutputFormat;
};

export function createProcessContext(): CliContext {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    cwd: process.cwd(),
    env: process.env,
  };
}

/**
 * Report an error on stderr and mark the run as failed
 */
export function reportError(context: CliContext, err: unknown): void {
  context.stderr(chalk.red(`Error: ${toError(err).message}`) + '\n');
  context.setExitCode(2);
}
