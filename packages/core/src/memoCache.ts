/**
 * MemoCache main class
 */

import * as path from 'path';
import type {
  CachedFunction,
  CachedFunctionDefinition,
  CachedResult,
  CallOptions,
  EntryInfo,
  FunctionDeclaration,
  MemoCacheOptions,
} from './types.js';
import { bindArguments, canonicalizeSignature, validateDeclaration } from './signature.js';
import { computeCacheKey } from './cacheKey.js';
import { RETURN_VALUE_FILENAME, resolveEntryPaths, type EntryPaths } from './entryPaths.js';
import { materializeOutputDirs, resolveOutputDirs } from './artifacts.js';
import { commitEntry, discardEntry, inspectEntry, stageEntry, writeEntryPayload } from './commit.js';
import { createManifest, readManifest } from './manifest.js';
import { listEntries, pruneStaging, type PruneStagingOptions } from './entryIndex.js';
import { ConfigurationError, CorruptEntryError, errorMessage } from './errors.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { assertValidOptions, formatZodError } from './options.js';
import { msgpackSerializer, type Serializer } from './serializer.js';
import { LocalFileStorage, type CacheStorage } from './storage.js';

/**
 * A call resolved to its key and entry location
 */
interface ResolvedCall<TArgs> {
  args: TArgs;
  signature: string;
  cacheKey: string;
  paths: EntryPaths;
}

export class MemoCache {
  readonly root: string;
  readonly logger: Logger;
  private readonly serializer: Serializer;
  private readonly storage: CacheStorage;
  private readonly cleanStagingOnError: boolean;
  private readonly validated = new WeakSet<FunctionDeclaration>();

  constructor(options: MemoCacheOptions) {
    assertValidOptions(options);
    this.root = options.root;
    this.logger = options.logger ?? createConsoleLogger(options.logLevel ?? 'info');
    this.serializer = options.serializer ?? msgpackSerializer;
    this.storage = options.storage ?? new LocalFileStorage();
    this.cleanStagingOnError = options.cleanStagingOnError ?? true;
  }

  /**
   * Wrap a computation. The declaration is validated immediately.
   */
  cached<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string = never>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>
  ): CachedFunction<TArgs, TResult, TOutputDir> {
    this.ensureValidated(definition);
    return bindCachedFunction(definition, () => this);
  }

  /**
   * Return the published result for this call, computing and publishing it on a miss
   */
  async getOrCompute<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string = never>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    args: TArgs,
    options: CallOptions = {}
  ): Promise<CachedResult<Awaited<TResult>, TOutputDir>> {
    const call = this.resolve(definition, args);
    const { publishedPath } = call.paths;

    const state = await inspectEntry(this.storage, publishedPath);
    if (state !== 'absent' && options.skipCache) {
      // Old entry must go, otherwise publishing fails on a non-empty target
      this.logger.debug(`Discarding ${publishedPath} (skipCache)`);
      await discardEntry(this.storage, publishedPath);
    } else if (state === 'complete') {
      try {
        const result = await this.readEntry(definition, call);
        this.logger.debug(`Cache hit for ${definition.name}: ${publishedPath}`);
        return result;
      } catch (err) {
        if (!(err instanceof CorruptEntryError)) throw err;
        this.logger.warn(`${err.message}. Will have to recompute.`);
        await discardEntry(this.storage, publishedPath);
      }
    } else if (state === 'incomplete') {
      this.logger.info(`Success token missing, entry is most likely partial. Will have to recompute: ${publishedPath}`);
      await discardEntry(this.storage, publishedPath);
    }

    return this.compute(definition, call);
  }

  /**
   * Read cache only (without execution)
   * @returns the published result, or null if absent or unreadable
   */
  async peek<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string = never>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    args: TArgs
  ): Promise<CachedResult<Awaited<TResult>, TOutputDir> | null> {
    const call = this.resolve(definition, args);
    if ((await inspectEntry(this.storage, call.paths.publishedPath)) !== 'complete') {
      return null;
    }
    try {
      return await this.readEntry(definition, call);
    } catch (err) {
      if (!(err instanceof CorruptEntryError)) throw err;
      this.logger.warn(err.message);
      return null;
    }
  }

  /**
   * Delete the entry for this call (idempotent, silently succeeds if not exists)
   */
  async invalidate<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string = never>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    args: TArgs
  ): Promise<void> {
    const call = this.resolve(definition, args);
    await discardEntry(this.storage, call.paths.publishedPath);
  }

  /**
   * Cache key a call resolves to
   */
  keyFor<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string = never>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    args: TArgs
  ): string {
    return this.resolve(definition, args).cacheKey;
  }

  /**
   * List published entries, optionally for one function
   */
  async listEntries(functionName?: string): Promise<EntryInfo[]> {
    return listEntries(this.storage, this.root, functionName);
  }

  /**
   * Remove staging directories leaked by interrupted computations
   */
  async pruneStaging(options: PruneStagingOptions = {}): Promise<string[]> {
    const removed = await pruneStaging(this.storage, this.root, options);
    for (const stagingPath of removed) {
      this.logger.debug(`Removed stale staging directory ${stagingPath}`);
    }
    return removed;
  }

  private ensureValidated(declaration: FunctionDeclaration): void {
    if (!this.validated.has(declaration)) {
      validateDeclaration(declaration);
      this.validated.add(declaration);
    }
  }

  private resolve<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    rawArgs: TArgs
  ): ResolvedCall<TArgs> {
    this.ensureValidated(definition);
    const bound = bindArguments(definition, rawArgs);
    let args = bound;
    if (definition.inputSchema) {
      const parsed = definition.inputSchema.safeParse(bound);
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid arguments to ${definition.name}: ${formatZodError(parsed.error)}`
        );
      }
      // Keys the schema strips still reach fn
      args = { ...bound, ...parsed.data };
    }
    // Keyed on the caller's bound arguments, never on the schema output
    const signature = canonicalizeSignature(definition, bound);
    const cacheKey = computeCacheKey(definition.name, signature);
    return {
      args,
      signature,
      cacheKey,
      paths: resolveEntryPaths(this.root, definition.name, cacheKey),
    };
  }

  /**
   * Read a published entry; every failure is a CorruptEntryError
   */
  private async readEntry<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    call: ResolvedCall<TArgs>
  ): Promise<CachedResult<Awaited<TResult>, TOutputDir>> {
    const { publishedPath } = call.paths;
    const manifest = await readManifest(this.storage, publishedPath);
    if (manifest.cacheKey !== call.cacheKey || manifest.functionName !== definition.name) {
      throw new CorruptEntryError('Manifest does not match the entry location', publishedPath);
    }

    let value: Awaited<TResult> | undefined;
    if (manifest.hasReturnValue) {
      const valuePath = path.join(publishedPath, RETURN_VALUE_FILENAME);
      let bytes: Uint8Array;
      try {
        bytes = await this.storage.readFile(valuePath);
      } catch (err) {
        throw new CorruptEntryError(`Return value is missing (${errorMessage(err)})`, publishedPath, {
          cause: err,
        });
      }
      try {
        value = this.decodeValue<TResult>(bytes);
      } catch (err) {
        throw new CorruptEntryError(
          `Corrupt cache file due to deserialization error (${errorMessage(err)})`,
          publishedPath,
          { cause: err }
        );
      }
    }

    const names = definition.outputDirs ?? [];
    const outputDirs = resolveOutputDirs(publishedPath, names);
    for (const name of names) {
      if (!(await this.storage.isDirectory(outputDirs[name]))) {
        throw new CorruptEntryError(`Output directory ${name} is missing`, publishedPath);
      }
    }

    return { value, outputDirs, cacheKey: call.cacheKey, hit: true };
  }

  private decodeValue<TResult>(bytes: Uint8Array): Awaited<TResult> {
    return this.serializer.decode(bytes) as Awaited<TResult>;
  }

  /**
   * Miss path: stage, compute, commit
   */
  private async compute<TArgs extends Record<string, unknown>, TResult, TOutputDir extends string>(
    definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
    call: ResolvedCall<TArgs>
  ): Promise<CachedResult<Awaited<TResult>, TOutputDir>> {
    const { stagingPath, publishedPath } = call.paths;
    const names = definition.outputDirs ?? [];
    this.logger.info(`Computing ${definition.name} into ${publishedPath}`);

    await stageEntry(this.storage, stagingPath);

    let value: Awaited<TResult> | undefined;
    try {
      const stagedDirs = await materializeOutputDirs(this.storage, stagingPath, names);
      const computed = await definition.fn(call.args, stagedDirs);

      // A miss returns what a later hit will read back
      const payload = computed === undefined ? undefined : this.serializer.encode(computed);
      value = payload === undefined ? undefined : this.decodeValue<TResult>(payload);

      const manifest = createManifest({
        functionName: definition.name,
        cacheKey: call.cacheKey,
        signature: call.signature,
        outputDirs: [...names],
        hasReturnValue: payload !== undefined,
      });
      await writeEntryPayload(this.storage, stagingPath, payload, manifest);
    } catch (err) {
      // Clean up staging directory on error
      if (this.cleanStagingOnError) {
        await discardEntry(this.storage, stagingPath);
      }
      throw err;
    }

    await commitEntry(this.storage, stagingPath, publishedPath);
    this.logger.debug(`Published ${publishedPath}`);

    return {
      value,
      outputDirs: resolveOutputDirs(publishedPath, names),
      cacheKey: call.cacheKey,
      hit: false,
    };
  }
}

/**
 * Build the callable for a definition; `resolveCache` is consulted on every call
 */
export function bindCachedFunction<
  TArgs extends Record<string, unknown>,
  TResult,
  TOutputDir extends string = never,
>(
  definition: CachedFunctionDefinition<TArgs, TResult, TOutputDir>,
  resolveCache: () => MemoCache
): CachedFunction<TArgs, TResult, TOutputDir> {
  // async so a missing cache surfaces as a rejection
  const call = async (args: TArgs, options?: CallOptions) =>
    resolveCache().getOrCompute(definition, args, options);

  return Object.assign(call, {
    functionName: definition.name,
    peek: async (args: TArgs) => resolveCache().peek(definition, args),
    invalidate: async (args: TArgs) => resolveCache().invalidate(definition, args),
    keyFor: (args: TArgs) => resolveCache().keyFor(definition, args),
  });
}
