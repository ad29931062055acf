/**
 * Unit tests for RequestScheduler
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RequestScheduler } from './request-scheduler.js';

describe('RequestScheduler', () => {
  let scheduler: RequestScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  // ============================================================================
  // Constructor
  // ============================================================================

  describe('Constructor', () => {
    it('should create scheduler with number parameter', () => {
      scheduler = new RequestScheduler(2000);

      expect(scheduler.getStats().minSpacingMs).toBe(2000);
    });

    it('should create scheduler with options object', () => {
      scheduler = new RequestScheduler({
        minSpacingMs: 300,
        name: 'JobsApiScheduler',
      });

      expect(scheduler.getStats().minSpacingMs).toBe(300);
    });

    it('should reject negative spacing', () => {
      expect(() => new RequestScheduler(-1)).toThrow(
        'RequestScheduler: minSpacingMs must be a non-negative number, got -1'
      );
    });
  });

  // ============================================================================
  // schedule()
  // ============================================================================

  describe('schedule()', () => {
    beforeEach(() => {
      scheduler = new RequestScheduler(2000);
    });

    it('should execute single task immediately', async () => {
      const task = vi.fn().mockResolvedValue('result');

      const promise = scheduler.schedule(task);
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('result');
      expect(task).toHaveBeenCalledTimes(1);
    });

    it('should execute tasks sequentially in call order', async () => {
      const executionOrder: number[] = [];

      const promises = [1, 2, 3].map((n) =>
        scheduler.schedule(async () => {
          executionOrder.push(n);
          return `result${n}`;
        })
      );

      await vi.runAllTimersAsync();

      await expect(Promise.all(promises)).resolves.toEqual([
        'result1',
        'result2',
        'result3',
      ]);
      expect(executionOrder).toEqual([1, 2, 3]);
    });

    it('should keep the minimum spacing between task starts', async () => {
      scheduler = new RequestScheduler(500);
      const timestamps: number[] = [];

      const tasks = Array.from({ length: 4 }, () =>
        scheduler.schedule(async () => {
          timestamps.push(Date.now());
        })
      );

      await vi.runAllTimersAsync();
      await Promise.all(tasks);

      expect(timestamps).toHaveLength(4);
      for (let i = 1; i < timestamps.length; i++) {
        expect(timestamps[i] - timestamps[i - 1]).toBeGreaterThanOrEqual(500);
      }
    });

    it('should not delay a task scheduled after the spacing has elapsed', async () => {
      scheduler = new RequestScheduler(100);
      const task = vi.fn().mockResolvedValue('done');

      const first = scheduler.schedule(task);
      await vi.runAllTimersAsync();
      await first;

      await vi.advanceTimersByTimeAsync(200);
      expect(scheduler.getTimeUntilNextExecution()).toBe(0);

      const second = scheduler.schedule(task);
      await vi.advanceTimersByTimeAsync(0);
      await second;

      expect(task).toHaveBeenCalledTimes(2);
    });

    it('should keep the chain alive after a failing task', async () => {
      const task1 = vi.fn().mockResolvedValue('success');
      const task2 = vi.fn().mockRejectedValue(new Error('Task failed'));
      const task3 = vi.fn().mockResolvedValue('success after error');

      const promise1 = scheduler.schedule(task1);
      const promise2 = scheduler.schedule(task2);
      const promise3 = scheduler.schedule(task3);
      const rejection = expect(promise2).rejects.toThrow('Task failed');

      await vi.runAllTimersAsync();

      await expect(promise1).resolves.toBe('success');
      await rejection;
      await expect(promise3).resolves.toBe('success after error');
    });

    it('should reject when a task throws synchronously', async () => {
      const task = vi.fn().mockImplementation(() => {
        throw new Error('Sync error');
      });

      const promise = scheduler.schedule(task);
      const rejection = expect(promise).rejects.toThrow('Sync error');

      await vi.runAllTimersAsync();
      await rejection;
    });
  });

  // ============================================================================
  // Statistics
  // ============================================================================

  describe('getStats()', () => {
    it('should report no wait before the first task', () => {
      scheduler = new RequestScheduler(3000);

      expect(scheduler.getStats()).toEqual({
        minSpacingMs: 3000,
        lastExecutionTime: 0,
        timeUntilNextExecution: 0,
        queueDepth: 0,
      });
    });

    it('should track queue depth while tasks are pending', async () => {
      scheduler = new RequestScheduler(1000);
      const task = vi.fn().mockResolvedValue('done');

      const promises = [scheduler.schedule(task), scheduler.schedule(task)];
      expect(scheduler.getQueueDepth()).toBe(2);

      await vi.runAllTimersAsync();
      await Promise.all(promises);

      expect(scheduler.getQueueDepth()).toBe(0);
    });

    it('should record the last execution time', async () => {
      scheduler = new RequestScheduler(1000);
      const promise = scheduler.schedule(async () => 'done');

      await vi.runAllTimersAsync();
      await promise;

      expect(scheduler.getStats().lastExecutionTime).toBe(Date.now());
      expect(scheduler.getTimeUntilNextExecution()).toBe(1000);
    });
  });
});
