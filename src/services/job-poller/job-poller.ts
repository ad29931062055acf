/**
 * JobPoller
 *
 * Submits a remote job and polls it until it reaches a terminal state,
 * under a mandatory client-side deadline.
 *
 * State handling per poll:
 * - SUCCEEDED ends the wait successfully
 * - FAILED rejects with JobFailedError (full status attached)
 * - CANCELLED rejects with JobCancelledError
 * - QUEUED, RUNNING, SUBMITTED and UNKNOWN sleep `checkIntervalMs`, then poll again
 * - a missing job record or state rejects with InvalidResponseError at once
 *
 * The first poll is issued right after submission. Polls never overlap.
 * When the deadline passes, the pending sleep is cancelled and no further
 * poll is issued; a poll already in flight is left to finish and its
 * result is dropped. The remote job itself is not cancelled.
 *
 * @example
 * ```typescript
 * const poller = new JobPoller({ transport: client });
 * const jobId = await poller.submitAndWait(
 *   { query: 'SELECT 1' },
 *   { timeoutMs: 5 * 60_000, checkIntervalMs: 2_000 }
 * );
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  InvalidResponseError,
  JobCancelledError,
  JobFailedError,
  JobTimeoutError,
} from '../../shared/errors/index.js';
import type {
  Job,
  JobControlTransport,
  JobId,
  JobState,
  JobStatusResponse,
  WaitOptions,
} from '../../shared/types/index.js';
import { sleep } from '../../utils/timing/index.js';
import { parseJobState } from './job-state.js';

export interface JobPollerDependencies<TParams> {
  /** Submission and status capabilities of the remote service */
  transport: JobControlTransport<TParams>;

  /**
   * Optional name for logging purposes
   * @default 'JobPoller'
   */
  name?: string;
}

export class JobPoller<TParams> {
  private readonly transport: JobControlTransport<TParams>;
  private readonly logger: ServiceLogger;

  constructor(dependencies: JobPollerDependencies<TParams>) {
    this.transport = dependencies.transport;
    this.logger = createServiceLogger(dependencies.name ?? 'JobPoller');
  }

  /**
   * Submit a job and wait until it succeeded
   *
   * Exactly one submission is made. Failed, cancelled and timed-out jobs are
   * not resubmitted; retrying means calling this again.
   *
   * @returns Id of the succeeded job
   * @throws InvalidResponseError if the submission or a status response is malformed
   * @throws JobFailedError, JobCancelledError if the job ends unsuccessfully
   * @throws JobTimeoutError if the deadline passes first
   * @throws TransportError (or whatever the transport throws), unchanged
   */
  async submitAndWait(params: TParams, options: WaitOptions): Promise<JobId> {
    validateWaitOptions(options);
    log.methodEntry(this.logger, 'submitAndWait', { ...options });

    const job = await this.submitJob(params);
    await this.waitForJob(job.id, options);

    log.methodExit(this.logger, 'submitAndWait', { jobId: job.id });
    return job.id;
  }

  /**
   * Submit a job without waiting for it
   *
   * @throws InvalidResponseError if the response carries no job id
   */
  async submitJob(params: TParams): Promise<Job> {
    log.externalApiCall(this.logger, 'JobTransport', 'submit');

    let jobId: JobId | null | undefined;
    try {
      jobId = (await this.transport.submit(params)).jobId;
    } catch (error) {
      log.methodError(this.logger, 'submitJob', toError(error));
      throw error;
    }

    if (!jobId) {
      const error = new InvalidResponseError('Submission response is missing the job id');
      log.methodError(this.logger, 'submitJob', error);
      throw error;
    }

    this.logger.info({ jobId }, 'Job submitted');
    return { id: jobId, submittedAt: new Date(), state: 'SUBMITTED' };
  }

  /**
   * Poll a job once and return an updated snapshot
   *
   * Terminal states are reported, not thrown.
   *
   * @throws InvalidResponseError if the status response is malformed
   */
  async checkJob(job: Job): Promise<Job> {
    const { state } = await this.pollOnce(job.id);
    if (state !== job.state) {
      log.stateTransition(this.logger, job.id, job.state, state);
    }
    return { ...job, state };
  }

  /**
   * Wait for an already submitted job to succeed
   *
   * Same semantics as the waiting part of submitAndWait().
   */
  async waitForJob(jobId: JobId, options: WaitOptions): Promise<void> {
    validateWaitOptions(options);
    const { timeoutMs, checkIntervalMs } = options;

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new JobTimeoutError(jobId, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      await Promise.race([
        this.pollUntilTerminal(jobId, checkIntervalMs, controller.signal),
        deadline,
      ]);
      this.logger.info({ jobId }, 'Job succeeded');
    } catch (error) {
      log.methodError(this.logger, 'waitForJob', toError(error), { jobId });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async pollUntilTerminal(
    jobId: JobId,
    checkIntervalMs: number,
    signal: AbortSignal
  ): Promise<void> {
    let previous: JobState = 'SUBMITTED';

    for (let attempt = 1; ; attempt++) {
      signal.throwIfAborted();

      const { state, status } = await this.pollOnce(jobId, attempt);

      if (signal.aborted) {
        this.logger.debug({ jobId, attempt, state }, 'Discarding poll result received after deadline');
        signal.throwIfAborted();
      }

      if (state !== previous) {
        log.stateTransition(this.logger, jobId, previous, state);
        previous = state;
      }

      switch (state) {
        case 'SUCCEEDED':
          return;
        case 'FAILED':
          throw new JobFailedError(jobId, status);
        case 'CANCELLED':
          throw new JobCancelledError(jobId, status);
        case 'SUBMITTED':
        case 'QUEUED':
        case 'RUNNING':
        case 'UNKNOWN':
          await sleep(checkIntervalMs, signal);
          break;
      }
    }
  }

  private async pollOnce(
    jobId: JobId,
    attempt = 1
  ): Promise<{ state: JobState; status: JobStatusResponse }> {
    log.externalApiCall(this.logger, 'JobTransport', 'pollStatus', { jobId, attempt });

    const status = await this.transport.pollStatus(jobId);

    if (status === null) {
      throw new InvalidResponseError(`No status record returned for job ${jobId}`);
    }
    if (!status.state) {
      throw new InvalidResponseError(`Status of job ${jobId} is missing its state`);
    }

    return { state: parseJobState(status.state), status };
  }
}

/**
 * @throws RangeError if the deadline is not positive or the interval is negative
 */
export function validateWaitOptions(options: WaitOptions): void {
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be a positive number, got ${options.timeoutMs}`);
  }
  if (!Number.isFinite(options.checkIntervalMs) || options.checkIntervalMs < 0) {
    throw new RangeError(
      `checkIntervalMs must be a non-negative number, got ${options.checkIntervalMs}`
    );
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
