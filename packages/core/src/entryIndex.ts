/**
 * Entry listing and staging cleanup
 */

import * as path from 'path';
import { isCacheKey } from './cacheKey.js';
import { inspectEntry } from './commit.js';
import { isStagingName } from './entryPaths.js';
import { CorruptEntryError } from './errors.js';
import { readManifest } from './manifest.js';
import type { CacheStorage } from './storage.js';
import type { EntryInfo, EntryManifest } from './types.js';

export interface PruneStagingOptions {
  /** Only remove staging directories untouched for at least this long, default 0 */
  olderThanMs?: number;
  /** Reference time, default Date.now() */
  now?: number;
}

async function functionNames(storage: CacheStorage, root: string, only?: string): Promise<string[]> {
  if (only !== undefined) return [only];
  const dirents = await storage.readdir(root);
  return dirents.filter((d) => d.isDirectory && !d.name.startsWith('.')).map((d) => d.name);
}

async function tryReadManifest(storage: CacheStorage, entryPath: string): Promise<EntryManifest | null> {
  try {
    return await readManifest(storage, entryPath);
  } catch (err) {
    if (err instanceof CorruptEntryError) return null;
    throw err;
  }
}

/**
 * List published entries under root, skipping staging directories
 */
export async function listEntries(
  storage: CacheStorage,
  root: string,
  functionName?: string
): Promise<EntryInfo[]> {
  const entries: EntryInfo[] = [];

  for (const fnName of await functionNames(storage, root, functionName)) {
    const fnDir = path.join(root, fnName);
    for (const dirent of await storage.readdir(fnDir)) {
      // Ignore staging dirs (may linger after crashes).
      if (!dirent.isDirectory || isStagingName(dirent.name) || !isCacheKey(dirent.name)) continue;
      const entryPath = path.join(fnDir, dirent.name);
      const state = await inspectEntry(storage, entryPath);
      if (state === 'absent') continue;
      entries.push({
        functionName: fnName,
        cacheKey: dirent.name,
        entryPath,
        state,
        manifest: await tryReadManifest(storage, entryPath),
      });
    }
  }

  return entries;
}

/**
 * Remove leaked staging directories
 * @returns removed paths
 */
export async function pruneStaging(
  storage: CacheStorage,
  root: string,
  options: PruneStagingOptions = {}
): Promise<string[]> {
  const olderThanMs = options.olderThanMs ?? 0;
  const now = options.now ?? Date.now();
  const removed: string[] = [];

  for (const fnName of await functionNames(storage, root)) {
    const fnDir = path.join(root, fnName);
    for (const dirent of await storage.readdir(fnDir)) {
      if (!dirent.isDirectory || !isStagingName(dirent.name)) continue;
      const stagingPath = path.join(fnDir, dirent.name);
      const mtime = await storage.mtimeMs(stagingPath);
      if (mtime === null || (olderThanMs > 0 && now - mtime < olderThanMs)) continue;
      await storage.remove(stagingPath);
      removed.push(stagingPath);
    }
  }

  return removed;
}
