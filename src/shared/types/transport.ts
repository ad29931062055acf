/**
 * Transport Capability Surface
 *
 * The only things the control-flow components need from a remote service.
 * A thin adapter over the service's RPC mechanism implements these
 * (see HttpJobClient for a JSON-over-HTTP one).
 */

import type { Cursor } from './cursor.js';
import type { JobId } from './job.js';

/**
 * Response to a job submission
 *
 * The id is optional because remote services do omit it; a missing id is
 * reported as an invalid response rather than trusted.
 */
export interface SubmitJobResponse {
  jobId?: JobId | null;
}

/**
 * Status of a remote job as reported by the service
 */
export interface JobStatusResponse {
  /** Remote state name (e.g. 'RUNNING'); missing means the response is malformed */
  state?: string | null;
  /** Remote job record, kept for diagnostics */
  detail?: unknown;
  /** Remote failure or cancellation reason, if any */
  reason?: string | null;
}

/**
 * One page of a paged listing
 */
export interface PageResponse<T> {
  /** Items of the page; null or undefined means the result set is missing */
  items: readonly T[] | null | undefined;
  /** Where to resume: `continue` for more pages, `exhausted` at the end */
  next: Cursor;
}

/**
 * Paged-fetch capability used by CursorStream
 */
export type PageFetcher<T> = (cursor: Cursor) => Promise<PageResponse<T>>;

/**
 * Job lifecycle capabilities
 *
 * @template TParams - Submission parameters understood by the remote service
 * @template TItem - Result item type of a finished job
 */
export interface JobTransport<TParams, TItem> {
  submit(params: TParams): Promise<SubmitJobResponse>;

  /**
   * @returns Current status, or null when the service has no record of the job
   */
  pollStatus(jobId: JobId): Promise<JobStatusResponse | null>;

  fetchPage(jobId: JobId, cursor: Cursor): Promise<PageResponse<TItem>>;
}

/**
 * Batch submission capability
 *
 * @template TEntry - Entry type of a built batch
 * @template TAck - Acknowledgement returned by the service
 */
export interface BatchTransport<TEntry, TAck> {
  submitBatch(entries: readonly TEntry[]): Promise<TAck>;
}

/**
 * The part of JobTransport the poller needs
 */
export type JobControlTransport<TParams> = Pick<
  JobTransport<TParams, unknown>,
  'submit' | 'pollStatus'
>;
