/**
 * Job Poller Module
 */

export { JobPoller, validateWaitOptions } from './job-poller.js';
export type { JobPollerDependencies } from './job-poller.js';
export { parseJobState, isTerminalState } from './job-state.js';
