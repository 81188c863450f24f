/**
 * Options validation
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import type { MemoCacheOptions } from './types.js';

const memoCacheOptionsSchema = z.object({
  root: z.string().trim().min(1, 'cache root must be a non-empty path'),
  logLevel: z.enum(LOG_LEVELS).optional(),
  cleanStagingOnError: z.boolean().optional(),
});

export const logLevelSchema = z.enum(LOG_LEVELS);

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.map(String).join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Throw ConfigurationError unless the options are usable
 */
export function assertValidOptions(options: MemoCacheOptions): void {
  const parsed = memoCacheOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid cache options: ${formatZodError(parsed.error)}`);
  }
}
