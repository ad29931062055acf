/**
 * Batch Limit Presets
 *
 * Size and count limits of the batch APIs this toolkit is usually pointed at.
 * Sizes are in bytes; see RecordsBuilder for how an entry is measured.
 */

import type { BatchLimits } from '../shared/types/index.js';

/**
 * Kinds of batch API with a known preset
 */
export enum BatchTarget {
  RECORD_STREAM = 'record-stream',
  MESSAGE_QUEUE = 'message-queue',
}

/**
 * Record stream put-records API: 1 MB per record, 5 MB and 500 records per call
 */
export const RECORD_STREAM_BATCH_LIMITS: Readonly<BatchLimits> = Object.freeze({
  singleLimit: 1_000_000,
  totalLimit: 5_000_000,
  recordLimit: 500,
});

/**
 * Message queue send-batch API: 256 KiB per message and per call, 10 messages
 */
export const MESSAGE_QUEUE_BATCH_LIMITS: Readonly<BatchLimits> = Object.freeze({
  singleLimit: 262_144,
  totalLimit: 262_144,
  recordLimit: 10,
});

const PRESETS: Record<BatchTarget, Readonly<BatchLimits>> = {
  [BatchTarget.RECORD_STREAM]: RECORD_STREAM_BATCH_LIMITS,
  [BatchTarget.MESSAGE_QUEUE]: MESSAGE_QUEUE_BATCH_LIMITS,
};

/**
 * Get the limit preset for a batch API
 */
export function getBatchLimits(target: BatchTarget): Readonly<BatchLimits> {
  return PRESETS[target];
}
