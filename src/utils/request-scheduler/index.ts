/**
 * Request Scheduler Module
 *
 * Spacing for rate-limited remote calls. Retrying transient failures is
 * left to the transport underneath.
 */

export { RequestScheduler } from './request-scheduler.js';
export type {
  RequestSchedulerOptions,
  RequestSchedulerStats,
} from './request-scheduler.js';
