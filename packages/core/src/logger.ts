/**
 * Logger
 *
 * Minimal leveled logger. The cache reports swallowed tier failures here.
 *
 * @module logger
 */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger interface accepted by the cache and the CLI
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Create a logger that writes `[prefix] message` to the console
 */
export function createConsoleLogger(level: LogLevel = 'warn', prefix = 'tierlru'): Logger {
  const enabled = (target: LogLevel): boolean => SEVERITY[target] <= SEVERITY[level];

  return {
    error: (msg) => {
      if (enabled('error')) console.error(`[${prefix}] ${msg}`);
    },
    warn: (msg) => {
      if (enabled('warn')) console.warn(`[${prefix}] ${msg}`);
    },
    info: (msg) => {
      if (enabled('info')) console.info(`[${prefix}] ${msg}`);
    },
    debug: (msg) => {
      if (enabled('debug')) console.debug(`[${prefix}] DEBUG: ${msg}`);
    },
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
