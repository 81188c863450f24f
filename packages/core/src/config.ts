/**
 * Process-wide cache configuration
 *
 * Set the root once, before the first cached call. Changing it while
 * cached calls are running is not supported.
 */

import { ConfigurationError } from './errors.js';
import { createConsoleLogger, type LogLevel } from './logger.js';
import { bindCachedFunction, MemoCache } from './memoCache.js';
import { formatZodError, logLevelSchema } from './options.js';
import { validateDeclaration } from './signature.js';
import type { CachedFunction, CachedFunctionDefinition } from './types.js';

let cacheRoot: string | undefined;
let logLevel: LogLevel = 'info';
let instance: MemoCache | undefined;

export function setCacheRoot(root: string): void {
  if (typeof root !== 'string' || !root.trim()) {
    throw new ConfigurationError('Cache root must be a non-empty path');
  }
  createConsoleLogger(logLevel).info(`Setting cache directory to: ${root}`);
  cacheRoot = root;
  instance = undefined;
}

export function getCacheRoot(): string | undefined {
  return cacheRoot;
}

export function setLogLevel(level: LogLevel): void {
  const parsed = logLevelSchema.safeParse(level);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid log level: ${formatZodError(parsed.error)}`);
  }
  logLevel = parsed.data;
  instance = undefined;
}

export function getLogLevel(): LogLevel {
  return logLevel;
}

/**
 * Forget all process-wide settings
 */
export function resetCacheConfig(): void {
  cacheRoot = undefined;
  logLevel = 'info';
  instance = undefined;
}

/**
 * The MemoCache built from the process-wide settings
 */
export function defaultMemoCache(): MemoCache {
  if (cacheRoot === undefined) {
    throw new ConfigurationError('Cache root is not set. Call setCacheRoot() before the first cached call.');
  }
  instance ??= new MemoCache({ root: cacheRoot, logLevel });
  return instance;
}

/**
 * Wrap a computation against the process-wide cache.
 * The declaration is checked now; the root is looked up on every call.
 */
export function cached<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string = never>(
  definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>
): CachedFunction<TArgs, TResult, TOutputDir> {
  validateDeclaration(definition);
  return bindCachedFunction(definition, defaultMemoCache);
}
