/**
 * Error Classes
 *
 * Configuration errors surface at construction time. Tier errors are caught
 * by the two-level cache and logged, except for whole-store operations
 * (delete, flush, close) which rethrow them.
 *
 * @module errors
 */

/**
 * Error thrown when a cache is constructed with an invalid configuration
 */
export class CacheConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CacheConfigError';
  }
}

/**
 * Error thrown by the disk tier for any I/O or database failure
 */
export class DiskStoreError extends Error {
  public readonly directory: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, directory: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'DiskStoreError';
    this.directory = directory;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when bytes cannot be decoded into a value
 */
export class ConverterError extends Error {
  public readonly errorCause: Error | undefined;

  constructor(message: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConverterError';
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when a configuration file cannot be read
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when configuration content is malformed or out of range
 */
export class ConfigParseError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigParseError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
