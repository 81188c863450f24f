/**
 * Cache key derivation
 */

import { createHash } from 'crypto';

/** Hex length of a SHA-512 digest */
export const CACHE_KEY_LENGTH = 128;

const CACHE_KEY_PATTERN = /^[a-f0-9]{128}$/;

/**
 * Generate the cache key for a function name + canonical signature (SHA-512).
 * Function names never contain NUL, so the first NUL ends the name.
 */
export function computeCacheKey(functionName: string, canonicalSignature: string): string {
  return createHash('sha512').update(`${functionName}\0${canonicalSignature}`, 'utf8').digest('hex');
}

export function isCacheKey(value: string): boolean {
  return CACHE_KEY_PATTERN.test(value);
}
