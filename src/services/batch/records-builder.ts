/**
 * RecordsBuilder
 *
 * Accumulates entries for one batch submission and enforces the target
 * service's per-entry, aggregate and count limits before anything is sent.
 *
 * A rejected add() leaves the builder untouched; on BatchFullError the
 * caller builds and submits what it has, then starts a new builder.
 *
 * @example
 * ```typescript
 * const builder = new RecordsBuilder(RECORD_STREAM_BATCH_LIMITS);
 * builder.add({ data: JSON.stringify(event), partitionKey: event.userId });
 * await transport.submitBatch(builder.build());
 * ```
 */

import { nanoid } from 'nanoid';
import {
  BatchConsumedError,
  BatchFullError,
  EntryTooLargeError,
} from '../../shared/errors/index.js';
import type {
  BatchLimits,
  BatchRecord,
  RecordEntry,
} from '../../shared/types/index.js';

const encoder = new TextEncoder();

const BATCH_LIMIT_NAMES = ['singleLimit', 'totalLimit', 'recordLimit'] as const;

/**
 * Size an entry counts against the limits: payload bytes plus partition key bytes
 */
export function measureEntry(data: Uint8Array | string, partitionKey: string): number {
  const dataSize = typeof data === 'string' ? encoder.encode(data).byteLength : data.byteLength;
  return dataSize + encoder.encode(partitionKey).byteLength;
}

/**
 * @throws Error if a limit is not a positive integer
 */
export function validateBatchLimits(limits: BatchLimits): void {
  for (const name of BATCH_LIMIT_NAMES) {
    const value = limits[name];
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Batch limit ${name} must be a positive integer, got ${value}`);
    }
  }
}

export class RecordsBuilder {
  private readonly entries: BatchRecord[] = [];
  private runningTotal = 0;
  private built = false;
  private readonly limits: Readonly<BatchLimits>;

  constructor(limits: BatchLimits) {
    validateBatchLimits(limits);
    this.limits = { ...limits };
  }

  /**
   * Add an entry
   *
   * @throws EntryTooLargeError if the entry alone reaches singleLimit
   * @throws BatchFullError if the entry would push the total to totalLimit or the count past recordLimit
   * @throws BatchConsumedError after build()
   */
  add(entry: RecordEntry): void {
    this.assertNotBuilt();

    const record = this.toRecord(entry);
    this.check(record.size);

    this.entries.push(record);
    this.runningTotal += record.size;
  }

  /**
   * Whether add() would accept the entry right now
   *
   * An entry without a partition key is measured with a key of the
   * generated length.
   */
  fits(entry: RecordEntry): boolean {
    if (this.built) {
      return false;
    }
    const size = measureEntry(entry.data, entry.partitionKey ?? generatedKeySample());
    return (
      size < this.limits.singleLimit &&
      this.runningTotal + size < this.limits.totalLimit &&
      this.entries.length < this.limits.recordLimit
    );
  }

  /**
   * Finalize the batch; the builder cannot be used afterwards
   */
  build(): BatchRecord[] {
    this.assertNotBuilt();
    this.built = true;
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  get totalBytes(): number {
    return this.runningTotal;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get batchLimits(): Readonly<BatchLimits> {
    return this.limits;
  }

  private toRecord(entry: RecordEntry): BatchRecord {
    const partitionKey = entry.partitionKey ?? nanoid();
    const data = typeof entry.data === 'string' ? encoder.encode(entry.data) : entry.data;
    const record: BatchRecord = {
      data,
      partitionKey,
      size: measureEntry(data, partitionKey),
    };
    if (entry.explicitHashKey !== undefined) {
      record.explicitHashKey = entry.explicitHashKey;
    }
    return record;
  }

  private check(size: number): void {
    const { singleLimit, totalLimit, recordLimit } = this.limits;

    if (size >= singleLimit) {
      throw new EntryTooLargeError(size, singleLimit);
    }

    const attemptedTotal = this.runningTotal + size;
    const attemptedCount = this.entries.length + 1;
    if (attemptedTotal >= totalLimit || this.entries.length >= recordLimit) {
      throw new BatchFullError(attemptedTotal, totalLimit, attemptedCount, recordLimit);
    }
  }

  private assertNotBuilt(): void {
    if (this.built) {
      throw new BatchConsumedError('RecordsBuilder');
    }
  }
}

/**
 * nanoid() keys are 21 URL-safe ASCII characters
 */
function generatedKeySample(): string {
  return 'x'.repeat(21);
}
