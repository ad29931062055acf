/**
 * Batch Types
 */

/**
 * Limits of one batch submission
 *
 * All three limits are exclusive upper bounds on what the builder accepts:
 * an entry must be smaller than singleLimit, the running total must stay
 * below totalLimit, and no more than recordLimit entries are kept.
 */
export interface BatchLimits {
  /** Entry size (payload + partition key bytes) must be below this */
  singleLimit: number;
  /** Aggregate size must stay below this */
  totalLimit: number;
  /** Maximum number of entries */
  recordLimit: number;
}

/**
 * Entry offered to RecordsBuilder.add()
 */
export interface RecordEntry {
  /** Payload; strings are measured and sent as UTF-8 */
  data: Uint8Array | string;
  /** Partition key; a random key is generated when omitted */
  partitionKey?: string;
  /** Explicit hash key overriding partition-key hashing */
  explicitHashKey?: string;
}

/**
 * Entry as accepted into a built batch
 */
export interface BatchRecord {
  data: Uint8Array;
  partitionKey: string;
  explicitHashKey?: string;
  /** Size counted against the limits */
  size: number;
}

/**
 * Entry of a message-queue batch
 *
 * Every optional field is explicit; leaving one out means "unset".
 */
export interface MessageEntry {
  /** Id unique within the batch */
  id: string;
  body: string;
  delaySeconds?: number;
  /** Group id for ordered (FIFO) queues */
  groupId?: string;
  /** Deduplication id for ordered (FIFO) queues */
  deduplicationId?: string;
  attributes?: Record<string, string>;
}

/**
 * Acknowledgement of one submitted batch
 */
export interface BatchAck {
  /** Number of entries the service rejected */
  failedCount: number;
  /** Per-entry results in submission order */
  results: BatchEntryResult[];
}

export interface BatchEntryResult {
  /** Remote id/sequence number for accepted entries */
  id?: string;
  /** Error code for rejected entries */
  errorCode?: string;
  errorMessage?: string;
}
