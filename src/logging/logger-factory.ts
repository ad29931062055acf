/**
 * Logger Factory
 *
 * Creates component-specific Pino child loggers with consistent patterns.
 * Provides helpers for the logging scenarios every component shares.
 */

import type pino from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Component logger
 * A Pino child logger carrying the `service` binding
 */
export type ServiceLogger = pino.Logger;

/**
 * Create a component logger with structured context
 *
 * @param serviceName - Name of the component (e.g., 'JobPoller', 'HttpJobClient')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('JobPoller');
 * logger.info('Job submitted');
 * // Output: {"level":"info","service":"JobPoller","msg":"Job submitted"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns
 *
 * Keeps the log format uniform across pollers, streams, caches and clients.
 */
export const LogPatterns = {
  /**
   * Log method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'submitAndWait', { timeoutMs: 30000 });
   * // Output: {"level":"debug","service":"...","method":"submitAndWait","params":{"timeoutMs":30000},"msg":"Entering submitAndWait"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'submitAndWait', error, { jobId: 'job-1' });
   * // Output: {"level":"error","service":"...","method":"submitAndWait","error":"...","stack":"...","jobId":"job-1","msg":"Error in submitAndWait"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log a call to the remote service (debug level)
   *
   * @param api - Remote API name
   * @param endpoint - Endpoint or capability name
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },

  /**
   * Log cache hit (debug level)
   */
  cacheHit: (logger: ServiceLogger, method: string, cacheKey?: string) => {
    logger.debug({ method, cacheKey }, `Cache hit`);
  },

  /**
   * Log cache miss (debug level)
   */
  cacheMiss: (logger: ServiceLogger, method: string, cacheKey?: string) => {
    logger.debug({ method, cacheKey }, `Cache miss`);
  },

  /**
   * Log a remote job state change (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.stateTransition(logger, 'job-1', 'QUEUED', 'RUNNING');
   * // Output: {"level":"debug","service":"...","jobId":"job-1","from":"QUEUED","to":"RUNNING","msg":"Job state QUEUED -> RUNNING"}
   * ```
   */
  stateTransition: (
    logger: ServiceLogger,
    jobId: string,
    from: string,
    to: string
  ) => {
    logger.debug({ jobId, from, to }, `Job state ${from} -> ${to}`);
  },

  /**
   * Log a fetched page of a cursor walk (debug level)
   */
  pageFetched: (
    logger: ServiceLogger,
    pageNumber: number,
    itemCount: number,
    exhausted: boolean
  ) => {
    logger.debug({ pageNumber, itemCount, exhausted }, `Fetched page ${pageNumber}`);
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * import { log } from '@jobrelay/core';
 *
 * log.methodEntry(logger, 'myMethod', { param: 'value' });
 * log.methodExit(logger, 'myMethod');
 * ```
 */
export const log = LogPatterns;
