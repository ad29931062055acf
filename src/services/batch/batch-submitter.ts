/**
 * BatchSubmitter
 *
 * Splits an arbitrary list of entries into consecutive batches that respect
 * the target's limits and submits them one after another.
 *
 * Every entry is validated before the first submission, so an oversized
 * entry anywhere in the list fails the call without touching the transport.
 * A transport failure stops the run; batches submitted before it stay
 * submitted.
 */

import { nanoid } from 'nanoid';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { BatchFullError } from '../../shared/errors/index.js';
import type {
  BatchLimits,
  BatchRecord,
  BatchTransport,
  RecordEntry,
} from '../../shared/types/index.js';
import { RecordsBuilder, validateBatchLimits } from './records-builder.js';

export interface BatchSubmitterDependencies<TAck> {
  /** Capability that sends one built batch */
  transport: BatchTransport<BatchRecord, TAck>;
  /** Limits of the target service */
  limits: BatchLimits;
}

export class BatchSubmitter<TAck> {
  private readonly transport: BatchTransport<BatchRecord, TAck>;
  private readonly limits: BatchLimits;
  private readonly logger: ServiceLogger;

  constructor(dependencies: BatchSubmitterDependencies<TAck>) {
    validateBatchLimits(dependencies.limits);
    this.transport = dependencies.transport;
    this.limits = { ...dependencies.limits };
    this.logger = createServiceLogger('BatchSubmitter');
  }

  /**
   * Split entries into batches and submit them in order
   *
   * @returns One acknowledgement per submitted batch, in submission order
   * @throws EntryTooLargeError or BatchFullError if an entry can never fit a batch (nothing is submitted)
   */
  async submitAll(entries: readonly RecordEntry[]): Promise<TAck[]> {
    log.methodEntry(this.logger, 'submitAll', { entryCount: entries.length });

    const keyed = entries.map((entry) => ({
      ...entry,
      partitionKey: entry.partitionKey ?? nanoid(),
    }));

    keyed.forEach((entry, index) => {
      try {
        new RecordsBuilder(this.limits).add(entry);
      } catch (error) {
        log.methodError(this.logger, 'submitAll', toError(error), { entryIndex: index });
        throw error;
      }
    });

    const batches = this.split(keyed);
    const acks: TAck[] = [];

    for (const [index, batch] of batches.entries()) {
      log.externalApiCall(this.logger, 'BatchTransport', 'submitBatch', {
        batchIndex: index,
        entryCount: batch.length,
      });
      try {
        acks.push(await this.transport.submitBatch(batch));
      } catch (error) {
        log.methodError(this.logger, 'submitAll', toError(error), {
          batchIndex: index,
          submittedBatches: acks.length,
        });
        throw error;
      }
    }

    log.methodExit(this.logger, 'submitAll', { batchCount: batches.length });
    return acks;
  }

  /**
   * Pack entries into consecutive batches
   */
  split(entries: readonly RecordEntry[]): BatchRecord[][] {
    const batches: BatchRecord[][] = [];
    let builder = new RecordsBuilder(this.limits);

    for (const entry of entries) {
      try {
        builder.add(entry);
      } catch (error) {
        if (!(error instanceof BatchFullError) || builder.isEmpty) {
          throw error;
        }
        batches.push(builder.build());
        builder = new RecordsBuilder(this.limits);
        builder.add(entry);
      }
    }

    if (!builder.isEmpty) {
      batches.push(builder.build());
    }
    return batches;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
