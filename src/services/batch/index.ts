/**
 * Batch Module
 *
 * Limit-enforcing batch builders and a submitter that packs and sends them.
 */

export { RecordsBuilder, measureEntry, validateBatchLimits } from './records-builder.js';
export { MessageBatchBuilder } from './message-batch-builder.js';
export type { MessageBatchBuilderOptions } from './message-batch-builder.js';
export { BatchSubmitter } from './batch-submitter.js';
export type { BatchSubmitterDependencies } from './batch-submitter.js';
