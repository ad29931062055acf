/**
 * Tests for RecordsBuilder
 */

import { describe, it, expect } from 'vitest';
import { RecordsBuilder, measureEntry } from './records-builder.js';
import {
  BatchConsumedError,
  BatchFullError,
  EntryTooLargeError,
} from '../../shared/errors/index.js';

const SMALL_LIMITS = { singleLimit: 10, totalLimit: 20, recordLimit: 3 };

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('RecordsBuilder', () => {
  describe('limit scenario 10 / 20 / 3', () => {
    it('should accept and reject entries exactly at the limit boundaries', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);

      // 10 bytes reaches the single limit
      expect(() => builder.add({ data: '0123456789', partitionKey: '' })).toThrow(
        EntryTooLargeError
      );

      builder.add({ data: '012345678', partitionKey: '' });
      builder.add({ data: '012345678', partitionKey: '' });
      expect(builder.totalBytes).toBe(18);

      // 18 + 9 = 27 >= 20
      expect(() => builder.add({ data: '012345678', partitionKey: '' })).toThrow(
        BatchFullError
      );

      builder.add({ data: '0', partitionKey: '' });
      expect(builder.totalBytes).toBe(19);
      expect(builder.size).toBe(3);

      // count is already at the record limit
      expect(() => builder.add({ data: '0', partitionKey: '' })).toThrow(BatchFullError);

      expect(builder.build().map((record) => record.size)).toEqual([9, 9, 1]);
    });

    it('should describe the rejected entry in EntryTooLargeError', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);

      const error = captureError(() =>
        builder.add({ data: '0123456789', partitionKey: '' })
      );

      expect(error).toBeInstanceOf(EntryTooLargeError);
      expect(error).toHaveProperty('entrySize', 10);
      expect(error).toHaveProperty('singleLimit', 10);
      expect(error).toHaveProperty('kind', 'entry-too-large');
      expect(error).toHaveProperty('message', 'Entry size 10 must be below single limit 10');
    });

    it('should describe the attempted totals in BatchFullError', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);
      builder.add({ data: '012345678', partitionKey: '' });
      builder.add({ data: '012345678', partitionKey: '' });

      const error = captureError(() =>
        builder.add({ data: '012345678', partitionKey: '' })
      );

      expect(error).toBeInstanceOf(BatchFullError);
      expect(error).toHaveProperty('attemptedTotal', 27);
      expect(error).toHaveProperty('totalLimit', 20);
      expect(error).toHaveProperty('attemptedCount', 3);
      expect(error).toHaveProperty('recordLimit', 3);
    });
  });

  describe('add()', () => {
    it('should leave state untouched when an entry is too large', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);
      builder.add({ data: 'abc', partitionKey: 'k' });

      expect(() => builder.add({ data: 'x'.repeat(50), partitionKey: 'k' })).toThrow(
        EntryTooLargeError
      );
      expect(() => builder.add({ data: 'x'.repeat(50), partitionKey: 'k' })).toThrow(
        EntryTooLargeError
      );

      expect(builder.size).toBe(1);
      expect(builder.totalBytes).toBe(4);
    });

    it('should generate a partition key when none is given', () => {
      const builder = new RecordsBuilder({
        singleLimit: 1000,
        totalLimit: 5000,
        recordLimit: 10,
      });

      builder.add({ data: 'payload' });
      const [record] = builder.build();

      expect(record.partitionKey).toMatch(/^[A-Za-z0-9_-]{21}$/);
      expect(record.size).toBe(7 + 21);
    });

    it('should keep an empty partition key as given', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);

      builder.add({ data: 'abc', partitionKey: '' });

      expect(builder.build()[0].partitionKey).toBe('');
    });

    it('should count partition key bytes against the limits', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);

      expect(() => builder.add({ data: '01234', partitionKey: '56789' })).toThrow(
        EntryTooLargeError
      );
    });

    it('should measure strings as UTF-8 bytes', () => {
      expect(measureEntry('é', '')).toBe(2);
      expect(measureEntry(new Uint8Array([1, 2, 3]), 'ab')).toBe(5);
    });

    it('should store string payloads as bytes and keep the explicit hash key', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);

      builder.add({ data: 'hi', partitionKey: 'p', explicitHashKey: '42' });

      expect(builder.build()).toEqual([
        {
          data: new Uint8Array([104, 105]),
          partitionKey: 'p',
          explicitHashKey: '42',
          size: 3,
        },
      ]);
    });

    it('should never let the running total reach the total limit', () => {
      const limits = { singleLimit: 40, totalLimit: 100, recordLimit: 6 };
      const builder = new RecordsBuilder(limits);

      for (let i = 0; i < 40; i++) {
        const length = (i * 7) % 45;
        try {
          builder.add({ data: 'x'.repeat(length), partitionKey: '' });
        } catch (error) {
          expect(
            error instanceof EntryTooLargeError || error instanceof BatchFullError
          ).toBe(true);
        }
        expect(builder.totalBytes).toBeLessThan(limits.totalLimit);
        expect(builder.size).toBeLessThanOrEqual(limits.recordLimit);
      }

      const records = builder.build();
      expect(records.reduce((sum, record) => sum + record.size, 0)).toBeLessThan(100);
      expect(records.every((record) => record.size < limits.singleLimit)).toBe(true);
    });
  });

  describe('fits()', () => {
    it('should mirror what add() would accept without mutating', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);
      builder.add({ data: '012345678', partitionKey: '' });
      builder.add({ data: '012345678', partitionKey: '' });

      expect(builder.fits({ data: '0', partitionKey: '' })).toBe(true);
      expect(builder.fits({ data: '012', partitionKey: '' })).toBe(false);
      expect(builder.fits({ data: '0123456789', partitionKey: '' })).toBe(false);
      expect(builder.size).toBe(2);
    });

    it('should account for a generated key when none is given', () => {
      const builder = new RecordsBuilder({ singleLimit: 25, totalLimit: 100, recordLimit: 5 });

      expect(builder.fits({ data: 'abc' })).toBe(true);
      expect(builder.fits({ data: 'abcd' })).toBe(false);
    });
  });

  describe('build()', () => {
    it('should refuse any use after build', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);
      builder.add({ data: 'a', partitionKey: '' });
      builder.build();

      expect(() => builder.add({ data: 'b', partitionKey: '' })).toThrow(BatchConsumedError);
      expect(() => builder.build()).toThrow(
        'RecordsBuilder has already been built; start a new batch'
      );
      expect(builder.fits({ data: 'b', partitionKey: '' })).toBe(false);
    });

    it('should build an empty batch when nothing was added', () => {
      const builder = new RecordsBuilder(SMALL_LIMITS);

      expect(builder.isEmpty).toBe(true);
      expect(builder.build()).toEqual([]);
    });
  });

  describe('constructor', () => {
    it('should reject non-positive limits', () => {
      expect(
        () => new RecordsBuilder({ singleLimit: 0, totalLimit: 20, recordLimit: 3 })
      ).toThrow('Batch limit singleLimit must be a positive integer, got 0');
    });

    it('should reject fractional limits', () => {
      expect(
        () => new RecordsBuilder({ singleLimit: 10, totalLimit: 20, recordLimit: 2.5 })
      ).toThrow('Batch limit recordLimit must be a positive integer, got 2.5');
    });
  });
});
