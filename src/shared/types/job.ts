/**
 * Remote Job Types
 */

/**
 * Opaque job identifier assigned by the remote service
 */
export type JobId = string;

/**
 * Lifecycle states of a remote job
 *
 * SUBMITTED is the client-side initial state. UNKNOWN stands in for any
 * remote state this package does not recognize and is polled like RUNNING.
 */
export type JobState =
  | 'SUBMITTED'
  | 'QUEUED'
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'CANCELLED'
  | 'UNKNOWN';

export type TerminalJobState = Extract<JobState, 'SUCCEEDED' | 'FAILED' | 'CANCELLED'>;

export const TERMINAL_JOB_STATES: readonly TerminalJobState[] = [
  'SUCCEEDED',
  'FAILED',
  'CANCELLED',
];

/**
 * Snapshot of a submitted job
 *
 * Owned by the caller; nothing in this package persists it.
 */
export interface Job {
  /** Remote job id */
  id: JobId;
  /** When the snapshot's submission was accepted (or first observed) */
  submittedAt: Date;
  /** Mapped state at snapshot time */
  state: JobState;
}

/**
 * Options for waiting on a job
 *
 * Both values are required; there is no unbounded wait.
 */
export interface WaitOptions {
  /** Overall deadline for reaching a terminal state, in milliseconds */
  timeoutMs: number;
  /** Pause between two status polls, in milliseconds */
  checkIntervalMs: number;
}
