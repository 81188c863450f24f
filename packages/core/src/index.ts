/**
 * memo-cache - disk-backed memoization
 *
 * Core concepts:
 * - Same canonical arguments → same entry
 * - Entries are built in private staging and published by one rename
 * - An entry without its success token does not exist
 */

export { MemoCache, bindCachedFunction } from './memoCache.js';

export {
  cached,
  setCacheRoot,
  getCacheRoot,
  setLogLevel,
  getLogLevel,
  resetCacheConfig,
  defaultMemoCache,
} from './config.js';

export type {
  CanonicalStringable,
  ParameterDeclaration,
  FunctionDeclaration,
  CachedFunctionDefinition,
  CachedResult,
  CallOptions,
  CachedFunction,
  EntryManifest,
  EntryState,
  EntryInfo,
  MemoCacheOptions,
} from './types.js';

export {
  MemoCacheError,
  ConfigurationError,
  CorruptEntryError,
  ConcurrentWriteConflictError,
} from './errors.js';

export { toCanonicalString, canonicalizeSignature, bindArguments, validateDeclaration } from './signature.js';
export { computeCacheKey, CACHE_KEY_LENGTH } from './cacheKey.js';
export {
  resolveEntryPaths,
  buildEntryPath,
  SUCCESS_TOKEN_FILENAME,
  RETURN_VALUE_FILENAME,
  MANIFEST_FILENAME,
} from './entryPaths.js';
export type { EntryPaths } from './entryPaths.js';
export { MANIFEST_VERSION, readManifest } from './manifest.js';
export type { PruneStagingOptions } from './entryIndex.js';

export { createConsoleLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { msgpackSerializer, jsonSerializer } from './serializer.js';
export type { Serializer } from './serializer.js';
export { LocalFileStorage } from './storage.js';
export type { CacheStorage, StorageEntry } from './storage.js';
