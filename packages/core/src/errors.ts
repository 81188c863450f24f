/**
 * Typed error classes
 *
 * Error hierarchy:
 * - MemoCacheError (base)
 *   - ConfigurationError (static misuse: unset root, unknown exclude name, bad arguments)
 *   - CorruptEntryError (published entry unreadable; recovered by recomputing)
 *   - ConcurrentWriteConflictError (lost a same-key publish race)
 *
 * Errors thrown by the wrapped computation are never wrapped.
 */

/** Base error class for all cache errors */
export class MemoCacheError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MemoCacheError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Misuse detected at declaration time or on the first call */
export class ConfigurationError extends MemoCacheError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/** A published entry carries the success token but cannot be read back */
export class CorruptEntryError extends MemoCacheError {
  readonly entryPath: string;

  constructor(message: string, entryPath: string, options?: { cause?: unknown }) {
    super(`${message}: ${entryPath}`, 'CORRUPT_ENTRY', options);
    this.name = 'CorruptEntryError';
    this.entryPath = entryPath;
  }
}

/** Another writer published the same key first */
export class ConcurrentWriteConflictError extends MemoCacheError {
  readonly publishedPath: string;

  constructor(publishedPath: string, options?: { cause?: unknown }) {
    super(
      `Entry was published by another writer while this call was computing: ${publishedPath}`,
      'CONCURRENT_WRITE_CONFLICT',
      options
    );
    this.name = 'ConcurrentWriteConflictError';
    this.publishedPath = publishedPath;
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
