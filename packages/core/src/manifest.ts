/**
 * Entry manifest operations
 */

import * as path from 'path';
import { z } from 'zod';
import { MANIFEST_FILENAME } from './entryPaths.js';
import { CorruptEntryError, errorMessage } from './errors.js';
import { formatZodError } from './options.js';
import type { CacheStorage } from './storage.js';
import type { EntryManifest } from './types.js';

/** Current manifest version */
export const MANIFEST_VERSION = '1.0.0';

const manifestSchema = z.object({
  manifestVersion: z.string(),
  functionName: z.string(),
  cacheKey: z.string(),
  signature: z.string(),
  outputDirs: z.array(z.string()),
  hasReturnValue: z.boolean(),
  createdAt: z.string(),
});

/**
 * Create manifest object
 */
export function createManifest(
  fields: Omit<EntryManifest, 'manifestVersion' | 'createdAt'>
): EntryManifest {
  return {
    manifestVersion: MANIFEST_VERSION,
    ...fields,
    createdAt: new Date().toISOString(),
  };
}

/**
 * Write manifest
 */
export async function writeManifest(
  storage: CacheStorage,
  entryPath: string,
  manifest: EntryManifest
): Promise<void> {
  await storage.writeFile(path.join(entryPath, MANIFEST_FILENAME), JSON.stringify(manifest, null, 2));
}

/**
 * Read manifest; any failure is reported as a corrupt entry
 */
export async function readManifest(storage: CacheStorage, entryPath: string): Promise<EntryManifest> {
  const manifestPath = path.join(entryPath, MANIFEST_FILENAME);
  let raw: unknown;
  try {
    const content = new TextDecoder().decode(await storage.readFile(manifestPath));
    raw = JSON.parse(content);
  } catch (err) {
    throw new CorruptEntryError(`Failed to read manifest (${errorMessage(err)})`, entryPath, { cause: err });
  }
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptEntryError(`Invalid manifest (${formatZodError(parsed.error)})`, entryPath);
  }
  return parsed.data;
}
