/**
 * Lookup Module
 */

export { CachedLookupService } from './cached-lookup-service.js';
export type {
  CachedLookupServiceDependencies,
  LookupSource,
} from './cached-lookup-service.js';
