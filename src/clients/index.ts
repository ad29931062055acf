/**
 * Clients Exports
 *
 * Transport adapters for remote job services
 */

export {
  HttpJobClient,
  type HttpJobClientDependencies,
  type BatchRecordWire,
  type ItemDecoder,
  type ResultsPageWire,
  type SubmitJobRequest,
} from './http-job/index.js';
