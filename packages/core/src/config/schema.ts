/**
 * Cache configuration schema
 *
 * @module config/schema
 */

import { z } from 'zod';

import { LOG_LEVELS } from '../logger.js';

export const CacheConfigSchema = z
  .object({
    /** Disk tier directory. Without one the cache is memory-only. */
    directory: z.string().min(1).optional(),
    appVersion: z.number().int().nonnegative(),
    /** Memory tier capacity in weight units */
    maxMemorySize: z.number().int().positive(),
    /** Disk tier capacity in bytes */
    maxDiskSize: z.number().int().positive(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .strict()
  .refine((config) => config.directory === undefined || config.maxMemorySize < config.maxDiskSize, {
    message: 'maxMemorySize must be smaller than maxDiskSize',
    path: ['maxMemorySize'],
  });

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Format the first issue of a failed parse as `path: message`
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid configuration';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
