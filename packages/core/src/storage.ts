/**
 * Storage backends
 *
 * The engine only needs a handful of directory operations plus one
 * indivisible publish. Remote backends must provide the same guarantee
 * for `publish`: either the whole staged tree appears at the target, or
 * nothing does.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConcurrentWriteConflictError } from './errors.js';

export interface StorageEntry {
  name: string;
  isDirectory: boolean;
}

export interface CacheStorage {
  exists(target: string): Promise<boolean>;
  isDirectory(target: string): Promise<boolean>;
  readFile(target: string): Promise<Uint8Array>;
  writeFile(target: string, data: Uint8Array | string): Promise<void>;
  mkdir(target: string): Promise<void>;
  readdir(target: string): Promise<StorageEntry[]>;
  /** Last modification time in ms, or null when missing */
  mtimeMs(target: string): Promise<number | null>;
  /** Recursive, idempotent removal */
  remove(target: string): Promise<void>;
  /**
   * Move a staged directory to its published location in one step.
   * Throws ConcurrentWriteConflictError when the target already exists.
   */
  publish(stagingPath: string, publishedPath: string): Promise<void>;
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Local filesystem backend
 */
export class LocalFileStorage implements CacheStorage {
  async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(target: string): Promise<boolean> {
    try {
      return (await fs.stat(target)).isDirectory();
    } catch {
      return false;
    }
  }

  async readFile(target: string): Promise<Uint8Array> {
    return fs.readFile(target);
  }

  async writeFile(target: string, data: Uint8Array | string): Promise<void> {
    const handle = await fs.open(target, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async mkdir(target: string): Promise<void> {
    await fs.mkdir(target, { recursive: true });
  }

  async readdir(target: string): Promise<StorageEntry[]> {
    try {
      const dirents = await fs.readdir(target, { withFileTypes: true });
      return dirents.map((d) => ({ name: d.name, isDirectory: d.isDirectory() }));
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return [];
      throw err;
    }
  }

  async mtimeMs(target: string): Promise<number | null> {
    try {
      return (await fs.stat(target)).mtimeMs;
    } catch {
      return null;
    }
  }

  async remove(target: string): Promise<void> {
    await fs.rm(target, { recursive: true, force: true });
  }

  async publish(stagingPath: string, publishedPath: string): Promise<void> {
    await fs.mkdir(path.dirname(publishedPath), { recursive: true });
    // rename() replaces an empty directory silently, so refuse any existing target first.
    if (await this.exists(publishedPath)) {
      throw new ConcurrentWriteConflictError(publishedPath);
    }
    try {
      await fs.rename(stagingPath, publishedPath);
    } catch (err) {
      const code = errorCode(err);
      // EEXIST or ENOTEMPTY means the target appeared in the meantime
      if (code === 'EEXIST' || code === 'ENOTEMPTY') {
        throw new ConcurrentWriteConflictError(publishedPath, { cause: err });
      }
      throw err;
    }
  }
}
