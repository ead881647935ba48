import { createHash } from 'node:crypto';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** What a fingerprint is derived from: the service address, or raw metadata text. */
export type FingerprintSource = { url: string } | { metadata: string };

interface CacheEntry<Model> {
  model: Model;
}

/**
 * Process-wide store of parsed service models, keyed by fingerprint.
 *
 * - `getOrAdd` is insert-if-absent: concurrent misses for one fingerprint
 *   share a single load, and a failed load is not stored.
 * - `clear` drops every entry; loads already in flight when it runs do not
 *   repopulate the cache.
 * - Reads of resolved entries are plain map lookups.
 *
 * Inject one through the client settings, or use {@link sharedMetadataCache}.
 */
export class MetadataCache<Model = unknown> {
  #entries: Map<string, CacheEntry<Model>> = new Map();
  #pending: Map<string, SafeWrapAsync<Error, Model>> = new Map();
  /** Bumped by `clear`, so loads started before it are discarded. */
  #generation = 0;

  /**
   * Derives a stable fingerprint.
   * Addresses are normalized: a trailing `$metadata` and trailing slashes are dropped.
   */
  static fingerprint(source: FingerprintSource): string {
    if ('url' in source) {
      return `url:${source.url.replace(/\$metadata$/, '').replace(/\/+$/, '')}`;
    }

    return `metadata:${createHash('sha256').update(source.metadata).digest('hex')}`;
  }

  /** Number of resolved entries. */
  get size(): number {
    return this.#entries.size;
  }

  /** Returns the resolved model, or `undefined` on a miss. */
  resolve(fingerprint: string): Model | undefined {
    return this.#entries.get(fingerprint)?.model;
  }

  /**
   * Returns the cached model, or runs `load` once and stores what it yields.
   *
   * @param fingerprint - Key from {@link MetadataCache.fingerprint}.
   * @param load - Fetches and parses the model on a miss.
   */
  getOrAdd(fingerprint: string, load: () => SafeWrapAsync<Error, Model>): SafeWrapAsync<Error, Model> {
    const cached = this.#entries.get(fingerprint);
    if (cached) {
      return Promise.resolve([null, cached.model]);
    }

    const pending = this.#pending.get(fingerprint);
    if (pending) {
      return pending;
    }

    const generation = this.#generation;
    const loading = (async (): SafeWrapAsync<Error, Model> => {
      const [errThrown, wrapped] = await safeWrapAsync(load);
      const current = this.#generation === generation;
      if (current) {
        this.#pending.delete(fingerprint);
      }

      if (errThrown) {
        return [new Error('error thrown while loading metadata', { cause: errThrown }), null];
      }

      const [errLoad, model] = wrapped;
      if (errLoad) {
        return [new Error('error loading metadata', { cause: errLoad }), null];
      }

      if (current && !this.#entries.has(fingerprint)) {
        this.#entries.set(fingerprint, { model });
      }

      return [null, model];
    })();

    this.#pending.set(fingerprint, loading);
    return loading;
  }

  /** Drops every entry and forgets loads in flight. */
  clear(): void {
    this.#generation += 1;
    this.#entries.clear();
    this.#pending.clear();
  }
}

/** Cache shared by every client that is not given its own. */
export const sharedMetadataCache = new MetadataCache();
