/**
 * Output directory materialization
 */

import * as path from 'path';
import type { CacheStorage } from './storage.js';

/**
 * Map each output directory name to its path under `entryPath`.
 * Always computed from the current location, never from a stored absolute path.
 */
export function resolveOutputDirs<TOutputDir extends string>(
  entryPath: string,
  names: readonly TOutputDir[]
): Record<TOutputDir, string> {
  const dirs: Partial<Record<TOutputDir, string>> = {};
  for (const name of names) {
    dirs[name] = path.join(entryPath, name);
  }
  return dirs as Record<TOutputDir, string>;
}

/**
 * Create the output directories inside a staging entry before the computation runs
 * @returns name -> staging path, to be injected as arguments
 */
export async function materializeOutputDirs<TOutputDir extends string>(
  storage: CacheStorage,
  stagingPath: string,
  names: readonly TOutputDir[]
): Promise<Record<TOutputDir, string>> {
  const dirs = resolveOutputDirs(stagingPath, names);
  for (const name of names) {
    await storage.mkdir(dirs[name]);
  }
  return dirs;
}
