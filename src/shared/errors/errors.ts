/**
 * Error Taxonomy
 *
 * Every error raised by this package extends JobRelayError and carries a
 * `kind` so callers can branch without instanceof chains across module copies.
 */

import type { JobId, JobStatusResponse } from '../types/index.js';

export type JobRelayErrorKind =
  | 'transport'
  | 'invalid'
  | 'cancelled'
  | 'failed'
  | 'timeout'
  | 'entry-too-large'
  | 'batch-full'
  | 'batch-consumed'
  | 'invalid-batch'
  | 'not-found';

/**
 * Base class of all errors raised by jobrelay
 */
export abstract class JobRelayError extends Error {
  abstract readonly kind: JobRelayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function isJobRelayError(value: unknown): value is JobRelayError {
  return value instanceof JobRelayError;
}

/**
 * Network or protocol failure reported by a transport adapter
 */
export class TransportError extends JobRelayError {
  readonly kind = 'transport';

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * An otherwise successful response was missing required fields
 *
 * Never retried: asking again for a structurally broken response cannot help.
 */
export class InvalidResponseError extends JobRelayError {
  readonly kind = 'invalid';
}

/**
 * The remote job ended in the CANCELLED state
 */
export class JobCancelledError extends JobRelayError {
  readonly kind = 'cancelled';

  constructor(
    public readonly jobId: JobId,
    public readonly status?: JobStatusResponse
  ) {
    super(
      `Job ${jobId} was cancelled${status?.reason ? `: ${status.reason}` : ''}`
    );
  }
}

/**
 * The remote job ended in the FAILED state
 *
 * `status` is the full status response of the failing poll.
 */
export class JobFailedError extends JobRelayError {
  readonly kind = 'failed';

  constructor(
    public readonly jobId: JobId,
    public readonly status: JobStatusResponse
  ) {
    super(`Job ${jobId} failed${status.reason ? `: ${status.reason}` : ''}`);
  }
}

/**
 * The client-side deadline elapsed before the job reached a terminal state
 *
 * The remote job keeps running; cancelling it is up to the caller.
 */
export class JobTimeoutError extends JobRelayError {
  readonly kind = 'timeout';

  constructor(
    public readonly jobId: JobId,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for job ${jobId}`);
  }
}

/**
 * A single entry is at or above the per-entry size limit
 */
export class EntryTooLargeError extends JobRelayError {
  readonly kind = 'entry-too-large';

  constructor(
    public readonly entrySize: number,
    public readonly singleLimit: number
  ) {
    super(`Entry size ${entrySize} must be below single limit ${singleLimit}`);
  }
}

/**
 * Accepting the entry would break the aggregate size or record count limit
 */
export class BatchFullError extends JobRelayError {
  readonly kind = 'batch-full';

  constructor(
    public readonly attemptedTotal: number,
    public readonly totalLimit: number,
    public readonly attemptedCount: number,
    public readonly recordLimit: number
  ) {
    super(
      `Batch is full: total size ${attemptedTotal} (limit ${totalLimit}), ` +
        `entries ${attemptedCount} (limit ${recordLimit})`
    );
  }
}

/**
 * A builder was used again after build()
 */
export class BatchConsumedError extends JobRelayError {
  readonly kind = 'batch-consumed';

  constructor(builderName: string) {
    super(`${builderName} has already been built; start a new batch`);
  }
}

/**
 * A message batch breaks the queue's batch rules
 */
export abstract class InvalidBatchError extends JobRelayError {
  readonly kind = 'invalid-batch';
}

export class EmptyBatchError extends InvalidBatchError {
  constructor() {
    super('Batch cannot be empty');
  }
}

export class TooManyEntriesError extends InvalidBatchError {
  constructor(
    public readonly count: number,
    public readonly maxEntries: number
  ) {
    super(`Batch contains ${count} entries, maximum is ${maxEntries}`);
  }
}

export class DuplicateEntryIdError extends InvalidBatchError {
  constructor(public readonly entryId: string) {
    super(`Duplicate entry id: ${entryId}`);
  }
}

/**
 * A required lookup found no value
 */
export class NotFoundError extends JobRelayError {
  readonly kind = 'not-found';

  constructor(public readonly key: string) {
    super(`No value found for ${key}`);
  }
}
