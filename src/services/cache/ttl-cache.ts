/**
 * TtlCache
 *
 * In-process memoizing cache for expensive async point lookups.
 *
 * - A live entry (now < expiresAt) is returned without calling the supplier.
 * - A `null` result is returned but never stored, so every miss is retried.
 * - A rejected supplier leaves the cache as it was.
 * - Entries are only replaced lazily on access after expiry.
 * - Concurrent get() calls for the same key share one supplier call.
 *
 * @example
 * ```typescript
 * const cache = new TtlCache<string, string>({ ttlMs: 5 * 60_000 });
 * const endpoint = await cache.get('orders-api', (name) => registry.resolve(name));
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';

export interface TtlCacheOptions {
  /** Time to live of a stored value in milliseconds */
  ttlMs: number;

  /**
   * Optional name for logging purposes
   * @default 'TtlCache'
   */
  name?: string;
}

/**
 * Supplier invoked on a miss; resolves to null when there is no value
 */
export type CacheSupplier<K, V> = (key: K) => Promise<V | null>;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly inFlight = new Map<K, Promise<V | null>>();
  private readonly ttlMs: number;
  private readonly logger: ServiceLogger;

  constructor(options: TtlCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs < 0) {
      throw new Error(`ttlMs must be a non-negative number, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.logger = createServiceLogger(options.name ?? 'TtlCache');
  }

  /**
   * Get the value for a key, calling the supplier on a miss or after expiry
   *
   * @param now - Reference time for the expiry check and the new expiry; defaults to the current time
   * @returns The cached or supplied value, or null when the supplier found none
   */
  async get(key: K, supplier: CacheSupplier<K, V>, now?: Date): Promise<V | null> {
    const at = (now ?? new Date()).getTime();
    const cacheKey = String(key);

    const entry = this.entries.get(key);
    if (entry !== undefined && at < entry.expiresAt) {
      log.cacheHit(this.logger, 'get', cacheKey);
      return entry.value;
    }

    const pending = this.inFlight.get(key);
    if (pending !== undefined) {
      this.logger.debug({ cacheKey }, 'Joining in-flight lookup');
      return pending;
    }

    log.cacheMiss(this.logger, 'get', cacheKey);
    const lookup = this.refresh(key, supplier, at);
    this.inFlight.set(key, lookup);
    try {
      return await lookup;
    } finally {
      this.inFlight.delete(key);
    }
  }

  /**
   * Drop the entry for a key; returns whether one existed
   */
  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop all entries; returns how many were dropped
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  /**
   * Number of stored entries, expired ones included
   */
  get size(): number {
    return this.entries.size;
  }

  private async refresh(key: K, supplier: CacheSupplier<K, V>, at: number): Promise<V | null> {
    let value: V | null;
    try {
      value = await supplier(key);
    } catch (error) {
      log.methodError(
        this.logger,
        'get',
        error instanceof Error ? error : new Error(String(error)),
        { cacheKey: String(key) }
      );
      throw error;
    }

    if (value === null) {
      this.logger.debug({ cacheKey: String(key) }, 'Supplier found no value, not caching');
      return null;
    }

    this.entries.set(key, { value, expiresAt: at + this.ttlMs });
    return value;
  }
}
