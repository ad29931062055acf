/**
 * jobrelay - Client-side control flow for async, paginated, rate-limited services
 *
 * - CursorStream: paged listings as async iterables
 * - RecordsBuilder / MessageBatchBuilder / BatchSubmitter: size-limited batches
 * - TtlCache / CachedLookupService: memoized point lookups
 * - JobPoller: submit and wait under a deadline
 * - ResultStreamer: submit, wait and stream the results
 */

// Export shared types and errors
export * from './shared/types/index.js';
export * from './shared/errors/index.js';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

// Export services
export * from './services/index.js';

export const version = '0.1.0';
