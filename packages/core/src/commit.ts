/**
 * Atomic commit protocol
 *
 * Everything is written under a private staging directory. The success
 * token is the last file written there; the staging directory is then
 * renamed onto the published path in one step. A published entry counts
 * only when it carries the token.
 */

import * as path from 'path';
import { RETURN_VALUE_FILENAME, SUCCESS_TOKEN_FILENAME } from './entryPaths.js';
import { writeManifest } from './manifest.js';
import type { CacheStorage } from './storage.js';
import type { EntryManifest, EntryState } from './types.js';

/**
 * Create the staging directory
 */
export async function stageEntry(storage: CacheStorage, stagingPath: string): Promise<void> {
  await storage.mkdir(stagingPath);
}

/**
 * Write the encoded return value (none for undefined) and manifest into staging
 */
export async function writeEntryPayload(
  storage: CacheStorage,
  stagingPath: string,
  payload: Uint8Array | undefined,
  manifest: EntryManifest
): Promise<void> {
  if (payload !== undefined) {
    await storage.writeFile(path.join(stagingPath, RETURN_VALUE_FILENAME), payload);
  }
  await writeManifest(storage, stagingPath, manifest);
}

/**
 * Mark the staged entry complete and publish it.
 * Throws ConcurrentWriteConflictError (after removing the staging directory)
 * when another writer published first.
 */
export async function commitEntry(
  storage: CacheStorage,
  stagingPath: string,
  publishedPath: string
): Promise<void> {
  await storage.writeFile(path.join(stagingPath, SUCCESS_TOKEN_FILENAME), '');
  try {
    await storage.publish(stagingPath, publishedPath);
  } catch (err) {
    await storage.remove(stagingPath);
    throw err;
  }
}

/**
 * Check whether a published entry is usable
 */
export async function inspectEntry(storage: CacheStorage, publishedPath: string): Promise<EntryState> {
  if (!(await storage.isDirectory(publishedPath))) {
    return 'absent';
  }
  if (await storage.exists(path.join(publishedPath, SUCCESS_TOKEN_FILENAME))) {
    return 'complete';
  }
  return 'incomplete';
}

/**
 * Recursively delete an entry or staging directory
 */
export async function discardEntry(storage: CacheStorage, entryPath: string): Promise<void> {
  await storage.remove(entryPath);
}
