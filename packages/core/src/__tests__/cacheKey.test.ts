/**
 * Cache key and entry path tests
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { createHash } from 'crypto';
import { computeCacheKey, isCacheKey, CACHE_KEY_LENGTH } from '../cacheKey.js';
import { buildEntryPath, isStagingName, resolveEntryPaths } from '../entryPaths.js';

describe('computeCacheKey', () => {
  it('should return a 128-character lowercase SHA-512 hex digest', () => {
    const key = computeCacheKey('sum', 'x=1;y=2');

    expect(key).toHaveLength(CACHE_KEY_LENGTH);
    expect(key).toMatch(/^[a-f0-9]{128}$/);
    expect(key).toBe(createHash('sha512').update('sum\0x=1;y=2').digest('hex'));
  });

  it('should be deterministic', () => {
    expect(computeCacheKey('sum', 'x=1')).toBe(computeCacheKey('sum', 'x=1'));
  });

  it('should separate functions with identical signatures', () => {
    expect(computeCacheKey('sum', 'x=1')).not.toBe(computeCacheKey('product', 'x=1'));
  });

  it('should not let the name/signature boundary shift', () => {
    expect(computeCacheKey('ab', 'c')).not.toBe(computeCacheKey('a', 'bc'));
  });

  it('should recognise keys', () => {
    expect(isCacheKey(computeCacheKey('f', ''))).toBe(true);
    expect(isCacheKey('abc')).toBe(false);
  });
});

describe('resolveEntryPaths', () => {
  const key = computeCacheKey('train', 'adataPath="a"');

  it('should place published entries at <root>/<function>/<key>', () => {
    expect(buildEntryPath('/cache', 'train', key)).toBe(path.join('/cache', 'train', key));
  });

  it('should place staging next to the published path under a private name', () => {
    const { publishedPath, stagingPath } = resolveEntryPaths('/cache', 'train', key);

    expect(path.dirname(stagingPath)).toBe(path.dirname(publishedPath));
    expect(stagingPath).not.toBe(publishedPath);
    expect(isStagingName(path.basename(stagingPath))).toBe(true);
    expect(isStagingName(path.basename(publishedPath))).toBe(false);
  });

  it('should give each attempt its own staging path', () => {
    const first = resolveEntryPaths('/cache', 'train', key).stagingPath;
    const second = resolveEntryPaths('/cache', 'train', key).stagingPath;
    expect(first).not.toBe(second);
  });
});
