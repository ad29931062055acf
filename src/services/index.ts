/**
 * Services Exports
 */

export * from './cursor-stream/index.js';
export * from './batch/index.js';
export * from './cache/index.js';
export * from './job-poller/index.js';
export * from './result-stream/index.js';
export * from './lookup/index.js';
