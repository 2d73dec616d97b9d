/**
 * Config Loader - Configuration loading and merging
 *
 * Loads tierlru.config.json from a root directory, merges it over the
 * defaults and applies TIERLRU_* environment variable overrides. The
 * result is validated against CacheConfigSchema.
 *
 * @module config/config-loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { ConfigLoadError, ConfigParseError, toError } from '../errors.js';
import { LOG_LEVELS, type LogLevel } from '../logger.js';

import { DEFAULT_CONFIG } from './defaults.js';
import { CacheConfigSchema, describeIssue, type CacheConfig } from './schema.js';

// ============================================================================
// Constants
// ============================================================================

/** Config file name, looked up in the root directory */
export const CONFIG_FILE = 'tierlru.config.json';

const ENV_PREFIX = 'TIERLRU_';

export const ENV_VARS = {
  DIRECTORY: `${ENV_PREFIX}DIRECTORY`,
  APP_VERSION: `${ENV_PREFIX}APP_VERSION`,
  MAX_MEMORY_SIZE: `${ENV_PREFIX}MAX_MEMORY_SIZE`,
  MAX_DISK_SIZE: `${ENV_PREFIX}MAX_DISK_SIZE`,
  LOG_LEVEL: `${ENV_PREFIX}LOG_LEVEL`,
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an integer from an environment variable. Blank values are unset;
 * anything else that is not a whole number is rejected.
 */
function parseEnvInteger(name: string, value: string | undefined, configPath: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw new ConfigParseError(`Invalid value for ${name}: "${value}" is not an integer`, configPath);
  }
  return num;
}

function parseEnvLogLevel(name: string, value: string | undefined, configPath: string): LogLevel | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const lower = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === lower);
  if (level === undefined) {
    throw new ConfigParseError(
      `Invalid value for ${name}: "${value}" (expected one of ${LOG_LEVELS.join(', ')})`,
      configPath
    );
  }
  return level;
}

/**
 * Drop undefined values so they do not shadow lower-precedence settings
 */
function defined(source: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Directory holding tierlru.config.json (default: cwd) */
  rootDir?: string | undefined;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined;
  /** Whether to apply environment variable overrides (default: true) */
  applyEnvOverrides?: boolean | undefined;
}

export interface ConfigLoadResult {
  config: CacheConfig;
  /** Path to the config file, if one was found */
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

/**
 * Loads the cache configuration
 */
export class ConfigLoader {
  private readonly rootDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly applyEnvOverrides: boolean;
  private readonly configPath: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? process.cwd());
    this.env = options.env ?? process.env;
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.configPath = path.join(this.rootDir, CONFIG_FILE);
  }

  /**
   * Load configuration. Explicit overrides take precedence over the
   * environment, which takes precedence over the file.
   */
  async load(overrides: Partial<CacheConfig> = {}): Promise<ConfigLoadResult> {
    let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
    let configFileFound = false;
    let envOverridesApplied = false;

    if (await fileExists(this.configPath)) {
      merged = { ...merged, ...(await this.loadFromFile(this.configPath)) };
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        merged = { ...merged, ...envConfig };
        envOverridesApplied = true;
      }
    }

    merged = { ...merged, ...defined(overrides) };

    const result = CacheConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigParseError(`Invalid configuration: ${describeIssue(result.error)}`, this.configPath);
    }

    const config = result.data;
    if (config.directory !== undefined) {
      config.directory = path.resolve(this.rootDir, config.directory);
    }

    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  private async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read configuration file: ${toError(error).message}`,
        filePath,
        toError(error)
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (parseError) {
      throw new ConfigParseError(
        `Failed to parse configuration file: ${toError(parseError).message}`,
        filePath,
        toError(parseError)
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigParseError('Configuration must be a JSON object', filePath);
    }
    return parsed;
  }

  private getEnvOverrides(): Record<string, unknown> {
    const integer = (name: string): number | undefined => parseEnvInteger(name, this.env[name], this.configPath);

    return defined({
      directory: this.env[ENV_VARS.DIRECTORY] || undefined,
      appVersion: integer(ENV_VARS.APP_VERSION),
      maxMemorySize: integer(ENV_VARS.MAX_MEMORY_SIZE),
      maxDiskSize: integer(ENV_VARS.MAX_DISK_SIZE),
      logLevel: parseEnvLogLevel(ENV_VARS.LOG_LEVEL, this.env[ENV_VARS.LOG_LEVEL], this.configPath),
    });
  }
}

/**
 * Load configuration from rootDir with environment overrides
 */
export async function loadConfig(
  rootDir: string,
  options: { env?: NodeJS.ProcessEnv; overrides?: Partial<CacheConfig> } = {}
): Promise<CacheConfig> {
  const loader = new ConfigLoader({ rootDir, env: options.env });
  const result = await loader.load(options.overrides);
  return result.config;
}
