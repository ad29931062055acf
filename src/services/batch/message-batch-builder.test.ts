/**
 * Tests for MessageBatchBuilder
 */

import { describe, it, expect } from 'vitest';
import { MessageBatchBuilder } from './message-batch-builder.js';
import {
  BatchConsumedError,
  DuplicateEntryIdError,
  EmptyBatchError,
  TooManyEntriesError,
} from '../../shared/errors/index.js';

describe('MessageBatchBuilder', () => {
  it('should build the added entries in order', () => {
    const entries = new MessageBatchBuilder({ maxEntries: 10 })
      .add({ id: 'm1', body: 'first' })
      .add({ id: 'm2', body: 'second', delaySeconds: 30 })
      .add({ id: 'm3', body: 'third', groupId: 'orders', deduplicationId: 'd-3' })
      .build();

    expect(entries).toEqual([
      { id: 'm1', body: 'first' },
      { id: 'm2', body: 'second', delaySeconds: 30 },
      { id: 'm3', body: 'third', groupId: 'orders', deduplicationId: 'd-3' },
    ]);
  });

  it('should keep message attributes', () => {
    const [entry] = new MessageBatchBuilder({ maxEntries: 10 })
      .add({ id: 'm1', body: 'body', attributes: { source: 'importer' } })
      .build();

    expect(entry.attributes).toEqual({ source: 'importer' });
  });

  it('should reject an empty batch', () => {
    expect(() => new MessageBatchBuilder({ maxEntries: 10 }).build()).toThrow(
      EmptyBatchError
    );
  });

  it('should reject more entries than the cap', () => {
    const builder = new MessageBatchBuilder({ maxEntries: 2 });
    builder.add({ id: 'a', body: '1' }).add({ id: 'b', body: '2' }).add({ id: 'c', body: '3' });

    expect(() => builder.build()).toThrow(TooManyEntriesError);
    expect(() => builder.build()).toThrow('Batch contains 3 entries, maximum is 2');
  });

  it('should reject duplicate ids', () => {
    const builder = new MessageBatchBuilder({ maxEntries: 10 })
      .add({ id: 'a', body: '1' })
      .add({ id: 'b', body: '2' })
      .add({ id: 'a', body: '3' });

    expect(() => builder.build()).toThrow(DuplicateEntryIdError);
    expect(() => builder.build()).toThrow('Duplicate entry id: a');
  });

  it('should stay usable after a failed build', () => {
    const builder = new MessageBatchBuilder({ maxEntries: 10 });

    expect(() => builder.build()).toThrow(EmptyBatchError);

    builder.add({ id: 'a', body: '1' });
    expect(builder.build()).toHaveLength(1);
  });

  it('should refuse any use after a successful build', () => {
    const builder = new MessageBatchBuilder({ maxEntries: 10 }).add({ id: 'a', body: '1' });
    builder.build();

    expect(() => builder.add({ id: 'b', body: '2' })).toThrow(BatchConsumedError);
    expect(() => builder.build()).toThrow(BatchConsumedError);
  });

  it('should not share entry objects with the caller', () => {
    const entry = { id: 'a', body: 'original' };
    const builder = new MessageBatchBuilder({ maxEntries: 10 }).add(entry);
    entry.body = 'changed';

    expect(builder.build()[0].body).toBe('original');
  });

  it('should reject a non-positive cap', () => {
    expect(() => new MessageBatchBuilder({ maxEntries: 0 })).toThrow(
      'maxEntries must be a positive integer, got 0'
    );
  });
});
