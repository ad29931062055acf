/**
 * Remote state name mapping
 */

import type { JobState, TerminalJobState } from '../../shared/types/index.js';
import { TERMINAL_JOB_STATES } from '../../shared/types/index.js';

/**
 * Remote spellings accepted for each state (after normalization)
 */
const STATE_ALIASES: Record<Exclude<JobState, 'UNKNOWN'>, readonly string[]> = {
  SUBMITTED: ['SUBMITTED'],
  QUEUED: ['QUEUED', 'PENDING', 'WAITING'],
  RUNNING: ['RUNNING', 'IN_PROGRESS', 'PROCESSING', 'STARTED'],
  SUCCEEDED: ['SUCCEEDED', 'SUCCESS', 'COMPLETED', 'COMPLETE', 'DONE'],
  FAILED: ['FAILED', 'FAILURE', 'ERROR'],
  CANCELLED: ['CANCELLED', 'CANCELED', 'ABORTED'],
};

const STATE_BY_ALIAS = new Map<string, JobState>(
  Object.entries(STATE_ALIASES).flatMap(([state, aliases]) =>
    aliases.map((alias): [string, JobState] => [alias, toJobState(state)])
  )
);

function toJobState(value: string): JobState {
  switch (value) {
    case 'SUBMITTED':
    case 'QUEUED':
    case 'RUNNING':
    case 'SUCCEEDED':
    case 'FAILED':
    case 'CANCELLED':
      return value;
    default:
      return 'UNKNOWN';
  }
}

/**
 * Map a remote state name to a JobState
 *
 * Case, surrounding whitespace and `-`/space separators are ignored.
 * Unrecognized names map to UNKNOWN.
 *
 * @example
 * ```typescript
 * parseJobState('Succeeded');   // 'SUCCEEDED'
 * parseJobState('in-progress'); // 'RUNNING'
 * parseJobState('PAUSED');      // 'UNKNOWN'
 * ```
 */
export function parseJobState(remoteState: string): JobState {
  const normalized = remoteState.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return STATE_BY_ALIAS.get(normalized) ?? 'UNKNOWN';
}

export function isTerminalState(state: JobState): state is TerminalJobState {
  return TERMINAL_JOB_STATES.some((terminal) => terminal === state);
}
