/**
 * Opens the cache a command operates on.
 */

import {
  DiskLruStore,
  StringConverter,
  TwoLevelLruCache,
  loadConfig,
  type CacheConfig,
} from 'tierlru-core';

import type { CliContext, GlobalOptions } from './context.js';

/**
 * Resolve configuration from tierlru.config.json, the environment and
 * command-line options. A disk directory is required.
 */
export async function resolveConfig(
  context: CliContext,
  options: GlobalOptions
): Promise<CacheConfig & { directory: string }> {
  const config = await loadConfig(context.cwd, {
    env: context.env,
    overrides: {
      directory: options.dir,
      appVersion: options.appVersion,
      maxMemorySize: options.maxMemory,
      maxDiskSize: options.maxDisk,
    },
  });

  const { directory } = config;
  if (directory === undefined) {
    throw new Error('No cache directory configured. Pass --dir or set TIERLRU_DIRECTORY.');
  }
  return { ...config, directory };
}

/**
 * Run fn against a string cache, closing it afterwards
 */
export async function withCache<T>(
  context: CliContext,
  options: GlobalOptions,
  fn: (cache: TwoLevelLruCache<string>, config: CacheConfig & { directory: string }) => T
): Promise<T> {
  const config = await resolveConfig(context, options);
  const cache = TwoLevelLruCache.fromConfig(config, new StringConverter());
  try {
    return fn(cache, config);
  } finally {
    cache.close();
  }
}

/**
 * Run fn against the raw disk store, closing it afterwards
 */
export async function withDiskStore<T>(
  context: CliContext,
  options: GlobalOptions,
  fn: (store: DiskLruStore) => T
): Promise<T> {
  const config = await resolveConfig(context, options);
  const store = DiskLruStore.open({
    directory: config.directory,
    appVersion: config.appVersion,
    maxSize: config.maxDiskSize,
  });
  try {
    return fn(store);
  } finally {
    store.close();
  }
}
