/**
 * RequestScheduler
 *
 * Serializes async tasks and keeps a minimum spacing between their starts.
 * Transport adapters route every remote call through one scheduler so a
 * poll loop, a page walk and a batch upload sharing a client stay under the
 * remote rate limit together.
 *
 * @example
 * ```typescript
 * // 300 requests/minute = 200ms spacing
 * const scheduler = new RequestScheduler({ minSpacingMs: 200, name: 'JobsApiScheduler' });
 *
 * const status = await scheduler.schedule(async () => {
 *   const response = await fetch('https://jobs.example.com/jobs/job-1');
 *   return response.json();
 * });
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { sleep } from '../timing/index.js';

export interface RequestSchedulerOptions {
  /**
   * Minimum spacing between task starts in milliseconds
   */
  minSpacingMs: number;

  /**
   * Optional name for logging purposes
   * @default 'RequestScheduler'
   */
  name?: string;
}

export interface RequestSchedulerStats {
  minSpacingMs: number;
  lastExecutionTime: number;
  timeUntilNextExecution: number;
  queueDepth: number;
}

export class RequestScheduler {
  private chain: Promise<void> = Promise.resolve();
  private lastExecutionTime = 0;
  private pending = 0;
  private readonly minSpacingMs: number;
  private readonly name: string;
  private readonly logger: ServiceLogger;

  /**
   * @param options - Configuration options or minimum spacing in milliseconds
   */
  constructor(options: RequestSchedulerOptions | number) {
    if (typeof options === 'number') {
      this.minSpacingMs = options;
      this.name = 'RequestScheduler';
    } else {
      this.minSpacingMs = options.minSpacingMs;
      this.name = options.name || 'RequestScheduler';
    }

    if (!Number.isFinite(this.minSpacingMs) || this.minSpacingMs < 0) {
      throw new Error(
        `${this.name}: minSpacingMs must be a non-negative number, got ${this.minSpacingMs}`
      );
    }

    this.logger = createServiceLogger(this.name);
    this.logger.debug(
      { minSpacingMs: this.minSpacingMs },
      'RequestScheduler initialized'
    );
  }

  /**
   * Schedule a task for execution with minimum spacing
   *
   * Tasks run one at a time in call order. A failing task rejects its own
   * promise and does not break the chain for the tasks queued behind it.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;

    return new Promise<T>((resolve, reject) => {
      this.chain = this.chain
        .then(async () => {
          const waitTime = this.getTimeUntilNextExecution();

          if (waitTime > 0) {
            this.logger.debug(
              { waitMs: waitTime, queueDepth: this.pending },
              'Waiting before executing request'
            );
            await sleep(waitTime);
          }

          try {
            log.methodEntry(this.logger, 'schedule', { waitedMs: waitTime });
            const result = await task();
            log.methodExit(this.logger, 'schedule', { success: true });
            resolve(result);
          } catch (error) {
            const normalized =
              error instanceof Error ? error : new Error(String(error));
            log.methodError(this.logger, 'schedule', normalized);
            reject(error);
          } finally {
            this.lastExecutionTime = Date.now();
            this.pending--;
          }
        })
        .catch((error: unknown) => {
          // Failures of the chain step itself, not of the task
          reject(error);
        });
    });
  }

  /**
   * Number of scheduled tasks that have not finished yet (including the running one)
   */
  getQueueDepth(): number {
    return this.pending;
  }

  /**
   * Milliseconds until the next task may start, or 0 if it may start now
   */
  getTimeUntilNextExecution(): number {
    const timeSinceLastExecution = Date.now() - this.lastExecutionTime;
    return Math.max(0, this.minSpacingMs - timeSinceLastExecution);
  }

  getStats(): RequestSchedulerStats {
    return {
      minSpacingMs: this.minSpacingMs,
      lastExecutionTime: this.lastExecutionTime,
      timeUntilNextExecution: this.getTimeUntilNextExecution(),
      queueDepth: this.pending,
    };
  }
}
