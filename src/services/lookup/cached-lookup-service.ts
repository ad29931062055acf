/**
 * CachedLookupService
 *
 * Memoizes named point lookups against a slow remote store (parameter
 * store, secret store, service registry) for a fixed time to live.
 *
 * @example
 * ```typescript
 * const lookups = new CachedLookupService({ source: parameterStore, ttlMs: 60_000 });
 * const endpoint = await lookups.require('/orders/endpoint');
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { NotFoundError } from '../../shared/errors/index.js';
import { TtlCache } from '../cache/index.js';

/**
 * Remote store of named values
 */
export interface LookupSource<V> {
  /**
   * @returns The value, or null when the store has no entry for `name`
   */
  fetch(name: string): Promise<V | null>;
}

export interface CachedLookupServiceDependencies<V> {
  source: LookupSource<V>;

  /** Time to live of a looked-up value in milliseconds */
  ttlMs: number;

  /**
   * Cache instance, mainly for tests
   * Defaults to a new TtlCache with `ttlMs`
   */
  cache?: TtlCache<string, V>;
}

export class CachedLookupService<V> {
  private readonly source: LookupSource<V>;
  private readonly cache: TtlCache<string, V>;
  private readonly logger: ServiceLogger;

  constructor(dependencies: CachedLookupServiceDependencies<V>) {
    this.source = dependencies.source;
    this.cache =
      dependencies.cache ??
      new TtlCache<string, V>({ ttlMs: dependencies.ttlMs, name: 'LookupCache' });
    this.logger = createServiceLogger('CachedLookupService');
  }

  /**
   * Look up a value, or null when the store has none
   *
   * Missing values are asked for again on every call.
   */
  async get(name: string): Promise<V | null> {
    return this.cache.get(name, (key) => {
      log.externalApiCall(this.logger, 'LookupSource', 'fetch', { name: key });
      return this.source.fetch(key);
    });
  }

  /**
   * Look up a value that must exist
   *
   * @throws NotFoundError if the store has no value for `name`
   */
  async require(name: string): Promise<V> {
    const value = await this.get(name);
    if (value === null) {
      throw new NotFoundError(name);
    }
    return value;
  }

  /**
   * Forget a cached value so the next lookup goes to the store
   */
  invalidate(name: string): boolean {
    return this.cache.delete(name);
  }
}
