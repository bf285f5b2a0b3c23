/**
 * Tests for timeout-wrapper utility
 */

import {
  withTimeout,
  TimeoutError,
  isTimeoutError,
  DEFAULT_TIMEOUTS,
} from '@/lib/timeout-wrapper';

describe('timeout-wrapper', () => {
  describe('TimeoutError', () => {
    it('creates error with correct properties', () => {
      const error = new TimeoutError('test operation', 5000);

      expect(error.name).toBe('TimeoutError');
      expect(error.operation).toBe('test operation');
      expect(error.timeoutMs).toBe(5000);
      expect(error.code).toBe('TIMEOUT_ERROR');
      expect(error.message).toBe('test operation timed out after 5000ms');
    });

    it('is instance of Error', () => {
      const error = new TimeoutError('test', 1000);
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('isTimeoutError', () => {
    it('returns true for TimeoutError instances', () => {
      const error = new TimeoutError('test', 1000);
      expect(isTimeoutError(error)).toBe(true);
    });

    it('returns false for regular Error', () => {
      const error = new Error('regular error');
      expect(isTimeoutError(error)).toBe(false);
    });

    it('returns false for null', () => {
      expect(isTimeoutError(null)).toBe(false);
    });

    it('returns false for undefined', () => {
      expect(isTimeoutError(undefined)).toBe(false);
    });

    it('returns false for string', () => {
      expect(isTimeoutError('error string')).toBe(false);
    });

    it('returns false for object with similar properties', () => {
      const fakeError = {
        name: 'TimeoutError',
        code: 'TIMEOUT_ERROR',
        operation: 'test',
        timeoutMs: 1000,
      };
      expect(isTimeoutError(fakeError)).toBe(false);
    });
  });

  describe('withTimeout', () => {
    it('resolves when promise completes before timeout', async () => {
      const fastPromise = Promise.resolve('success');
      const result = await withTimeout(fastPromise, 1000, 'fast operation');
      expect(result).toBe('success');
    });

    it('rejects with TimeoutError when promise takes too long', async () => {
      const slowPromise = new Promise((resolve) =>
        setTimeout(() => resolve('too late'), 500)
      );

      await expect(
        withTimeout(slowPromise, 100, 'slow operation')
      ).rejects.toThrow(TimeoutError);
    });

    it('TimeoutError contains correct operation name', async () => {
      const slowPromise = new Promise((resolve) =>
        setTimeout(() => resolve('too late'), 500)
      );

      try {
        await withTimeout(slowPromise, 100, 'my custom operation');
        throw new Error('Expected TimeoutError to be thrown');
      } catch (error) {
        expect(isTimeoutError(error)).toBe(true);
        if (isTimeoutError(error)) {
          expect(error.operation).toBe('my custom operation');
          expect(error.timeoutMs).toBe(100);
        }
      }
    });

    it('preserves original error when promise rejects', async () => {
      const failingPromise = Promise.reject(new Error('original error'));

      await expect(
        withTimeout(failingPromise, 1000, 'failing operation')
      ).rejects.toThrow('original error');
    });

    it('clears timeout when promise resolves', async () => {
      jest.useFakeTimers();

      const promise = Promise.resolve('done');
      const resultPromise = withTimeout(promise, 10000, 'test');

      await resultPromise;

      // Advance timers - should not cause any issues since timeout was cleared
      jest.advanceTimersByTime(15000);

      jest.useRealTimers();
    });

    it('clears timeout when promise rejects', async () => {
      jest.useFakeTimers();

      const promise = Promise.reject(new Error('fail'));
      const resultPromise = withTimeout(promise, 10000, 'test');

      await expect(resultPromise).rejects.toThrow('fail');

      // Advance timers - should not cause any issues since timeout was cleared
      jest.advanceTimersByTime(15000);

      jest.useRealTimers();
    });

    it('handles zero timeout', async () => {
      const promise = new Promise((resolve) =>
        setTimeout(() => resolve('result'), 10)
      );

      await expect(withTimeout(promise, 0, 'zero timeout')).rejects.toThrow(
        TimeoutError
      );
    });

    it('works with async functions returning different types', async () => {
      const numberPromise = Promise.resolve(42);
      const objectPromise = Promise.resolve({ key: 'value' });
      const arrayPromise = Promise.resolve([1, 2, 3]);

      const numResult = await withTimeout(numberPromise, 1000, 'number');
      const objResult = await withTimeout(objectPromise, 1000, 'object');
      const arrResult = await withTimeout(arrayPromise, 1000, 'array');

      expect(numResult).toBe(42);
      expect(objResult).toEqual({ key: 'value' });
      expect(arrResult).toEqual([1, 2, 3]);
    });
  });

  describe('DEFAULT_TIMEOUTS', () => {
    it('bounds a cell query at 5 seconds', () => {
      expect(DEFAULT_TIMEOUTS.CELL_QUERY).toBe(5000);
    });

    it('gives aggregate counts more time than a cell query', () => {
      expect(DEFAULT_TIMEOUTS.REGION_COUNT).toBeGreaterThan(DEFAULT_TIMEOUTS.CELL_QUERY);
    });

    it('keeps the location lookup short', () => {
      expect(DEFAULT_TIMEOUTS.LOCATION_LOOKUP).toBe(3000);
    });
  });
});
