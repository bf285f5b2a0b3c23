import { withRetry, isTransientError } from '@/lib/retry';
import { ConnectionError, QueryError } from '@/lib/errors';
import { TimeoutError } from '@/lib/timeout-wrapper';
import { logger } from '@/lib/logger';

jest.mock('@/lib/logger', () => ({
  logger: {
    sync: {
      warn: jest.fn(),
      error: jest.fn(),
    },
  },
}));

const transient = () => Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });

describe('retry', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('isTransientError', () => {
    it.each([
      ['a timeout', new TimeoutError('cell query 9q8', 5000)],
      ['a connection error', new ConnectionError()],
      ['a coded network error', transient()],
      ['a serialization failure', Object.assign(new Error('could not serialize access'), { code: '40001' })],
      ['a query error caused by a reset', new QueryError('insertTrace', transient())],
    ])('treats %s as transient', (_label, error) => {
      expect(isTransientError(error)).toBe(true);
    });

    it.each([
      ['a plain query error', new QueryError('insertTrace', new Error('duplicate key'))],
      ['a validation failure', new Error('name is required')],
      ['a non-error', 'boom'],
    ])('treats %s as permanent', (_label, error) => {
      expect(isTransientError(error)).toBe(false);
    });
  });

  describe('withRetry', () => {
    it('returns the first successful result', async () => {
      const fn = jest.fn<Promise<string>, []>().mockResolvedValue('ok');

      await expect(withRetry(fn)).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('retries transient failures with backoff', async () => {
      const fn = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(transient())
        .mockRejectedValueOnce(transient())
        .mockResolvedValue('saved');

      await expect(withRetry(fn, { baseDelayMs: 1, context: 'insertTrace' })).resolves.toBe('saved');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(logger.sync.warn).toHaveBeenNthCalledWith(
        1,
        '[Retry] insertTrace attempt 1/3 failed, retrying in 1ms',
        { error: 'read ECONNRESET', attempt: 1, maxAttempts: 3 },
      );
      expect(logger.sync.warn).toHaveBeenNthCalledWith(
        2,
        '[Retry] insertTrace attempt 2/3 failed, retrying in 2ms',
        { error: 'read ECONNRESET', attempt: 2, maxAttempts: 3 },
      );
    });

    it('does not retry permanent failures', async () => {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('duplicate key'));

      await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow('duplicate key');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('gives up after maxAttempts', async () => {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(transient());

      await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 1 })).rejects.toThrow('read ECONNRESET');
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });
});
