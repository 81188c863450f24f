/**
 * Entry layout under the cache root
 */

import * as path from 'path';

/** Empty marker file; its presence makes an entry valid */
export const SUCCESS_TOKEN_FILENAME = 'success_token';

/** Serialized return value */
export const RETURN_VALUE_FILENAME = 'return_value.bin';

/** Manifest filename */
export const MANIFEST_FILENAME = '.memo-manifest.json';

/** Prefix of private staging directories */
export const STAGING_PREFIX = '.staging-';

export interface EntryPaths {
  /** <root>/<functionName>/<cacheKey> */
  publishedPath: string;
  /** Sibling of publishedPath, unique per attempt */
  stagingPath: string;
}

/**
 * Build published entry path
 */
export function buildEntryPath(root: string, functionName: string, cacheKey: string): string {
  return path.join(root, functionName, cacheKey);
}

/**
 * Build staging path (at same level as published path, so publishing is a same-directory rename)
 */
export function buildStagingPath(root: string, functionName: string, cacheKey: string): string {
  const random = Math.random().toString(36).slice(2, 10);
  return path.join(root, functionName, `${STAGING_PREFIX}${cacheKey}-${random}`);
}

export function resolveEntryPaths(root: string, functionName: string, cacheKey: string): EntryPaths {
  return {
    publishedPath: buildEntryPath(root, functionName, cacheKey),
    stagingPath: buildStagingPath(root, functionName, cacheKey),
  };
}

export function isStagingName(name: string): boolean {
  return name.startsWith(STAGING_PREFIX);
}

