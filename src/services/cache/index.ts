/**
 * Cache Module
 *
 * Time-boxed memoization of async point lookups.
 */

export { TtlCache } from './ttl-cache.js';
export type { TtlCacheOptions, CacheSupplier } from './ttl-cache.js';
