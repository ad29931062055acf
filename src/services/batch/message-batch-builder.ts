/**
 * MessageBatchBuilder
 *
 * Collects message-queue entries for one batch send. Unlike RecordsBuilder,
 * entries are checked as a whole at build(): the batch must be non-empty,
 * within the entry cap, and every id must be unique.
 */

import {
  BatchConsumedError,
  DuplicateEntryIdError,
  EmptyBatchError,
  TooManyEntriesError,
} from '../../shared/errors/index.js';
import type { MessageEntry } from '../../shared/types/index.js';

export interface MessageBatchBuilderOptions {
  /** Maximum number of entries per batch (10 for most queues) */
  maxEntries: number;
}

export class MessageBatchBuilder {
  private readonly entries: MessageEntry[] = [];
  private built = false;

  constructor(private readonly options: MessageBatchBuilderOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0) {
      throw new Error(
        `maxEntries must be a positive integer, got ${options.maxEntries}`
      );
    }
  }

  /**
   * @throws BatchConsumedError after build()
   */
  add(entry: MessageEntry): this {
    if (this.built) {
      throw new BatchConsumedError('MessageBatchBuilder');
    }
    this.entries.push({ ...entry });
    return this;
  }

  /**
   * Validate and finalize the batch
   *
   * @throws EmptyBatchError, TooManyEntriesError, DuplicateEntryIdError
   * @throws BatchConsumedError after a successful build()
   */
  build(): MessageEntry[] {
    if (this.built) {
      throw new BatchConsumedError('MessageBatchBuilder');
    }

    if (this.entries.length === 0) {
      throw new EmptyBatchError();
    }

    if (this.entries.length > this.options.maxEntries) {
      throw new TooManyEntriesError(this.entries.length, this.options.maxEntries);
    }

    const seen = new Set<string>();
    for (const entry of this.entries) {
      if (seen.has(entry.id)) {
        throw new DuplicateEntryIdError(entry.id);
      }
      seen.add(entry.id);
    }

    this.built = true;
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }
}
