/**
 * Atomic commit protocol tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { commitEntry, discardEntry, inspectEntry, stageEntry, writeEntryPayload } from '../commit.js';
import { SUCCESS_TOKEN_FILENAME, RETURN_VALUE_FILENAME, MANIFEST_FILENAME } from '../entryPaths.js';
import { createManifest, readManifest } from '../manifest.js';
import { materializeOutputDirs } from '../artifacts.js';
import { msgpackSerializer } from '../serializer.js';
import { LocalFileStorage } from '../storage.js';
import { ConcurrentWriteConflictError, CorruptEntryError } from '../errors.js';

describe('atomic commit', () => {
  const storage = new LocalFileStorage();
  let testRoot: string;
  let stagingPath: string;
  let publishedPath: string;

  beforeEach(async () => {
    testRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'memo-cache-commit-test-'));
    stagingPath = path.join(testRoot, 'fn', '.staging-key-1');
    publishedPath = path.join(testRoot, 'fn', 'key');
  });

  afterEach(async () => {
    await fs.rm(testRoot, { recursive: true, force: true });
  });

  async function stageWithValue(target: string, value: unknown): Promise<void> {
    await stageEntry(storage, target);
    const manifest = createManifest({
      functionName: 'fn',
      cacheKey: 'key',
      signature: 'a=1',
      outputDirs: [],
      hasReturnValue: value !== undefined,
    });
    const payload = value === undefined ? undefined : msgpackSerializer.encode(value);
    await writeEntryPayload(storage, target, payload, manifest);
  }

  it('should report a missing entry as absent', async () => {
    expect(await inspectEntry(storage, publishedPath)).toBe('absent');
  });

  it('should report an entry without success token as incomplete', async () => {
    await stageWithValue(publishedPath, 42);
    expect(await inspectEntry(storage, publishedPath)).toBe('incomplete');
  });

  it('should publish staging with the success token and remove the staging path', async () => {
    await stageWithValue(stagingPath, { answer: 42 });
    await commitEntry(storage, stagingPath, publishedPath);

    expect(await inspectEntry(storage, publishedPath)).toBe('complete');
    expect(await storage.exists(stagingPath)).toBe(false);
    expect(await fs.readFile(path.join(publishedPath, SUCCESS_TOKEN_FILENAME), 'utf-8')).toBe('');

    const bytes = await fs.readFile(path.join(publishedPath, RETURN_VALUE_FILENAME));
    expect(msgpackSerializer.decode(bytes)).toEqual({ answer: 42 });
  });

  it('should not write a return value file for undefined', async () => {
    await stageWithValue(stagingPath, undefined);
    await commitEntry(storage, stagingPath, publishedPath);

    expect(await storage.exists(path.join(publishedPath, RETURN_VALUE_FILENAME))).toBe(false);
    expect((await readManifest(storage, publishedPath)).hasReturnValue).toBe(false);
  });

  it('should publish materialized output directories with the entry', async () => {
    await stageWithValue(stagingPath, undefined);
    const dirs = await materializeOutputDirs(storage, stagingPath, ['model', 'plots']);
    await fs.writeFile(path.join(dirs.model, 'weights.txt'), '0.5');
    await commitEntry(storage, stagingPath, publishedPath);

    expect(await fs.readFile(path.join(publishedPath, 'model', 'weights.txt'), 'utf-8')).toBe('0.5');
    expect(await storage.isDirectory(path.join(publishedPath, 'plots'))).toBe(true);
  });

  it('should refuse to overwrite a published entry', async () => {
    await stageWithValue(stagingPath, 'first');
    await commitEntry(storage, stagingPath, publishedPath);

    const loserStaging = path.join(testRoot, 'fn', '.staging-key-2');
    await stageWithValue(loserStaging, 'second');

    await expect(commitEntry(storage, loserStaging, publishedPath)).rejects.toBeInstanceOf(
      ConcurrentWriteConflictError
    );
    expect(await storage.exists(loserStaging)).toBe(false);

    const bytes = await fs.readFile(path.join(publishedPath, RETURN_VALUE_FILENAME));
    expect(msgpackSerializer.decode(bytes)).toBe('first');
  });

  it('should refuse to publish onto an existing empty directory', async () => {
    await fs.mkdir(publishedPath, { recursive: true });
    await stageWithValue(stagingPath, 1);

    await expect(commitEntry(storage, stagingPath, publishedPath)).rejects.toBeInstanceOf(
      ConcurrentWriteConflictError
    );
  });

  it('should discard entries recursively and idempotently', async () => {
    await stageWithValue(publishedPath, 1);
    await discardEntry(storage, publishedPath);
    expect(await storage.exists(publishedPath)).toBe(false);
    await expect(discardEntry(storage, publishedPath)).resolves.toBeUndefined();
  });
});

describe('readManifest', () => {
  const storage = new LocalFileStorage();
  let testRoot: string;

  beforeEach(async () => {
    testRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'memo-cache-manifest-test-'));
  });

  afterEach(async () => {
    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should report unparsable manifests as corrupt entries', async () => {
    await fs.writeFile(path.join(testRoot, MANIFEST_FILENAME), '{');
    await expect(readManifest(storage, testRoot)).rejects.toBeInstanceOf(CorruptEntryError);
  });

  it('should report manifests with missing fields as corrupt entries', async () => {
    await fs.writeFile(path.join(testRoot, MANIFEST_FILENAME), JSON.stringify({ functionName: 'fn' }));
    await expect(readManifest(storage, testRoot)).rejects.toThrow(/^Invalid manifest/);
  });

  it('should report a missing manifest as a corrupt entry', async () => {
    await expect(readManifest(storage, testRoot)).rejects.toBeInstanceOf(CorruptEntryError);
  });
});
