export {
  JobRelayError,
  isJobRelayError,
  TransportError,
  InvalidResponseError,
  JobCancelledError,
  JobFailedError,
  JobTimeoutError,
  EntryTooLargeError,
  BatchFullError,
  BatchConsumedError,
  InvalidBatchError,
  EmptyBatchError,
  TooManyEntriesError,
  DuplicateEntryIdError,
  NotFoundError,
} from './errors.js';
export type { JobRelayErrorKind } from './errors.js';
