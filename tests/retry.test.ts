/**
 * Tests for the retry combinator
 */

import { withRetry, sleep, DEFAULT_RETRY_CONFIG, RetryConfig, RetryLog } from '../src/utils/retry.js';
import {
  CancellationError,
  TransportError,
  isRetryableError,
} from '../src/core/errors.js';

const FAST: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1,
  maxDelayMs: 1,
  multiplier: 1,
};

describe('Retry Logic', () => {
  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const result = await withRetry(fn);

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      let attempts = 0;
      const fn = jest.fn().mockImplementation(() => {
        attempts++;
        if (attempts < 3) {
          return Promise.reject(new Error('Temporary failure'));
        }
        return Promise.resolve('success');
      });

      const result = await withRetry(fn, FAST);
      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });

    it('should pass the attempt number to the function', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail'))
        .mockResolvedValueOnce('ok');

      await withRetry(fn, FAST);

      expect(fn.mock.calls).toEqual([[1], [2]]);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should rethrow the last error after max attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Always fails'));

      await expect(withRetry(fn, { ...FAST, maxAttempts: 3 })).rejects.toThrow('Always fails');

      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry errors the predicate rejects', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Bad request'));

      await expect(withRetry(fn, FAST, { shouldRetry: () => false })).rejects.toThrow(
        'Bad request'
      );

      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log retry attempts', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail 1'))
        .mockRejectedValueOnce(new Error('Fail 2'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, FAST, { onLog: (log) => logs.push(log) });

      expect(logs.map((log) => log.success)).toEqual([false, false, true]);
      expect(logs[0].error).toBe('Fail 1');
      expect(logs[0].nextRetryInMs).toBe(1);
      expect(logs[2].attempt).toBe(3);
    });

    it('should report no next retry on the final failure', async () => {
      const logs: RetryLog[] = [];
      const fn = jest.fn().mockRejectedValue(new Error('Down'));

      await expect(
        withRetry(fn, { ...FAST, maxAttempts: 2 }, { onLog: (log) => logs.push(log) })
      ).rejects.toThrow('Down');

      expect(logs.map((log) => log.nextRetryInMs)).toEqual([1, undefined]);
    });
  });

  describe('Delays', () => {
    it('should wait the fixed delay between attempts', async () => {
      const startTime = Date.now();
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, {
        maxAttempts: 2,
        initialDelayMs: 100,
        maxDelayMs: 100,
        multiplier: 1,
      });

      const duration = Date.now() - startTime;
      expect(duration).toBeGreaterThanOrEqual(90);
    });

    it('should grow the delay with a multiplier, capped at maxDelayMs', async () => {
      const logs: RetryLog[] = [];
      const fn = jest.fn().mockRejectedValue(new Error('Fail'));

      await expect(
        withRetry(
          fn,
          { maxAttempts: 4, initialDelayMs: 5, maxDelayMs: 12, multiplier: 2 },
          { onLog: (log) => logs.push(log) }
        )
      ).rejects.toThrow('Fail');

      expect(logs.map((log) => log.delay)).toEqual([5, 10, 12, 12]);
    });

    it('should default to a fixed delay', () => {
      expect(DEFAULT_RETRY_CONFIG.multiplier).toBe(1);
      expect(DEFAULT_RETRY_CONFIG.initialDelayMs).toBe(DEFAULT_RETRY_CONFIG.maxDelayMs);
    });
  });

  describe('Cancellation', () => {
    it('should not call the function when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const fn = jest.fn().mockResolvedValue('never');

      await expect(withRetry(fn, FAST, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancellationError
      );
      expect(fn).not.toHaveBeenCalled();
    });

    it('should interrupt the delay between attempts', async () => {
      const controller = new AbortController();
      const fn = jest.fn().mockRejectedValue(new Error('Fail'));

      setTimeout(() => controller.abort(), 20);

      await expect(
        withRetry(
          fn,
          { maxAttempts: 3, initialDelayMs: 10_000, maxDelayMs: 10_000, multiplier: 1 },
          { signal: controller.signal }
        )
      ).rejects.toBeInstanceOf(CancellationError);
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('sleep', () => {
    it('should resolve after the delay', async () => {
      await expect(sleep(1)).resolves.toBeUndefined();
    });

    it('should reject at once for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(CancellationError);
    });
  });
});

describe('Error Classification', () => {
  it('should identify retryable errors', () => {
    expect(isRetryableError(new TransportError('connect ECONNREFUSED', 'network'))).toBe(true);
  });

  it('should identify non-retryable errors', () => {
    expect(isRetryableError(new TransportError('API error', 'http', { status: 500 }))).toBe(false);
    expect(isRetryableError(new TransportError('Error reading stream', 'stream'))).toBe(false);
    expect(isRetryableError(new CancellationError())).toBe(false);
    expect(isRetryableError(new Error('ECONNREFUSED'))).toBe(false);
  });
});
