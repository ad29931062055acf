/**
 * HTTP Job API Client Exports
 */

export { HttpJobClient } from './http-job-client.js';
export type { HttpJobClientDependencies } from './http-job-client.js';
export type {
  BatchRecordWire,
  ItemDecoder,
  ResultsPageWire,
  SubmitJobRequest,
} from './types.js';
