/**
 * Tests for CachedLookupService
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';
import { CachedLookupService, type LookupSource } from './cached-lookup-service.js';
import { NotFoundError } from '../../shared/errors/index.js';

describe('CachedLookupService', () => {
  let source: MockProxy<LookupSource<string>>;
  let service: CachedLookupService<string>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    source = mock<LookupSource<string>>();
    service = new CachedLookupService({ source, ttlMs: 60_000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('get()', () => {
    it('should fetch once and serve repeats from the cache', async () => {
      source.fetch.mockResolvedValue('https://orders.test');

      await expect(service.get('/orders/endpoint')).resolves.toBe('https://orders.test');
      await expect(service.get('/orders/endpoint')).resolves.toBe('https://orders.test');

      expect(source.fetch).toHaveBeenCalledExactlyOnceWith('/orders/endpoint');
    });

    it('should fetch again after the time to live', async () => {
      source.fetch.mockResolvedValueOnce('v1').mockResolvedValueOnce('v2');

      await service.get('/flag');
      vi.advanceTimersByTime(60_000);

      await expect(service.get('/flag')).resolves.toBe('v2');
      expect(source.fetch).toHaveBeenCalledTimes(2);
    });

    it('should not cache a missing value', async () => {
      source.fetch.mockResolvedValueOnce(null).mockResolvedValueOnce('created');

      await expect(service.get('/late')).resolves.toBeNull();
      await expect(service.get('/late')).resolves.toBe('created');
      expect(source.fetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('require()', () => {
    it('should return an existing value', async () => {
      source.fetch.mockResolvedValue('test-secret');

      await expect(service.require('/db/password')).resolves.toBe('test-secret');
    });

    it('should throw NotFoundError for a missing value', async () => {
      source.fetch.mockResolvedValue(null);

      await expect(service.require('/db/password')).rejects.toThrow(
        new NotFoundError('/db/password')
      );
    });

    it('should pass source errors through', async () => {
      const failure = new Error('store unavailable');
      source.fetch.mockRejectedValue(failure);

      await expect(service.require('/db/password')).rejects.toBe(failure);
    });
  });

  describe('invalidate()', () => {
    it('should make the next lookup go to the source', async () => {
      source.fetch.mockResolvedValueOnce('old').mockResolvedValueOnce('new');

      await service.get('/key');
      expect(service.invalidate('/key')).toBe(true);

      await expect(service.get('/key')).resolves.toBe('new');
      expect(service.invalidate('/missing')).toBe(false);
    });
  });
});
