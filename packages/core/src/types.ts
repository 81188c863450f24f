/**
 * MemoCache type definitions
 */

import type { ZodType } from 'zod';
import type { Logger, LogLevel } from './logger.js';
import type { Serializer } from './serializer.js';
import type { CacheStorage } from './storage.js';

/**
 * Capability for argument values that are not plain data.
 * The returned string must be injective: distinct values never render the same.
 */
export interface CanonicalStringable {
  toCanonicalString(): string;
}

/**
 * One declared parameter of a cached function
 */
export interface ParameterDeclaration {
  name: string;
  /** The parameter has a default iff this key is present (even when undefined) */
  default?: unknown;
}

/**
 * Static description of a cached function, validated once at creation time
 */
export interface FunctionDeclaration {
  /** Function name, used as the directory under the cache root */
  name: string;
  /** Declared parameters, in declaration order */
  parameters: readonly ParameterDeclaration[];
  /** Parameters whose value is a destination directory injected by the cache */
  outputDirs?: readonly string[];
  /** Parameters never hashed into the key */
  exclude?: readonly string[];
  /** Parameters left out of the key when their value equals the declared default */
  excludeIfDefault?: readonly string[];
}

/**
 * Definition passed to `cached()` / `getOrCompute()`
 */
export interface CachedFunctionDefinition<
  TArgs extends Record<string, unknown>,
  TResult,
  TOutputDir extends string = never,
> extends FunctionDeclaration {
  outputDirs?: readonly TOutputDir[];
  /** Optional validation applied to the bound arguments before hashing */
  inputSchema?: ZodType<TArgs>;
  /**
   * The wrapped computation, sync or async. `outputDirs` maps each declared
   * output directory to a fresh directory inside the entry being built.
   */
  fn: (args: TArgs, outputDirs: Record<TOutputDir, string>) => TResult;
}

/**
 * Uniform result shape of a cached call
 */
export interface CachedResult<TResult, TOutputDir extends string = never> {
  /** Return value of the computation (undefined when it returned nothing) */
  value: TResult | undefined;
  /** Output directory name -> path inside the published entry */
  outputDirs: Record<TOutputDir, string>;
  /** Key of the entry that produced this result */
  cacheKey: string;
  /** Whether the result was read from an existing entry */
  hit: boolean;
}

/**
 * Per-call options
 */
export interface CallOptions {
  /** Discard any published entry and recompute */
  skipCache?: boolean;
}

/**
 * Callable returned by `cached()`
 */
export interface CachedFunction<
  TArgs extends Record<string, unknown>,
  TResult,
  TOutputDir extends string = never,
> {
  (args: TArgs, options?: CallOptions): Promise<CachedResult<Awaited<TResult>, TOutputDir>>;
  /** Function name */
  functionName: string;
  /** Read the published result without computing */
  peek(args: TArgs): Promise<CachedResult<Awaited<TResult>, TOutputDir> | null>;
  /** Remove the entry for these arguments (idempotent) */
  invalidate(args: TArgs): Promise<void>;
  /** Cache key these arguments resolve to */
  keyFor(args: TArgs): string;
}

/**
 * Entry manifest file structure
 */
export interface EntryManifest {
  /** Manifest version */
  manifestVersion: string;
  /** Function name */
  functionName: string;
  /** Hex cache key */
  cacheKey: string;
  /** Canonical signature the key was derived from */
  signature: string;
  /** Output directory names (relative to the entry) */
  outputDirs: string[];
  /** Whether return_value.bin was written */
  hasReturnValue: boolean;
  /** Creation time */
  createdAt: string;
}

/**
 * Validity of a published entry
 */
export type EntryState = 'absent' | 'incomplete' | 'complete';

/**
 * Published entry as seen by listEntries()
 */
export interface EntryInfo {
  functionName: string;
  cacheKey: string;
  entryPath: string;
  state: Exclude<EntryState, 'absent'>;
  /** Null when the manifest is missing or unreadable */
  manifest: EntryManifest | null;
}

/**
 * MemoCache configuration
 */
export interface MemoCacheOptions {
  /** Cache root directory */
  root: string;
  /** Log verbosity, default 'info' */
  logLevel?: LogLevel;
  /** Custom log sink (overrides logLevel) */
  logger?: Logger;
  /** Return value codec, default msgpack */
  serializer?: Serializer;
  /** Storage backend, default local filesystem */
  storage?: CacheStorage;
  /** Whether to remove the staging directory when the computation fails, default true */
  cleanStagingOnError?: boolean;
}
