/**
 * Retry combinator for transport calls
 *
 * The delay between attempts is fixed by default (multiplier 1); a larger
 * multiplier turns it into exponential backoff capped at maxDelayMs.
 */

import { CancellationError } from '../core/errors.js';

export interface RetryConfig {
  /** Total attempts, including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 3000,
  maxDelayMs: 3000,
  multiplier: 1,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Errors for which this returns false are thrown at once. Default: retry everything */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting stops the loop before the next attempt and interrupts the delay */
  signal?: AbortSignal;
  onLog?: (log: RetryLog) => void;
}

/**
 * Executes a function with bounded retries
 * @param fn - Called once per attempt with the 1-based attempt number
 * @returns The first successful result; otherwise rethrows the error of the
 * last attempt, or the first non-retryable one
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = () => true, signal, onLog } = options;
  let delay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new CancellationError('Operation cancelled before attempt', signal.reason);
    }

    try {
      const result = await fn(attempt);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      const willRetry = attempt < config.maxAttempts && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? delay : undefined,
      });

      if (!willRetry) {
        throw error;
      }

      await sleep(delay, signal);
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }
}

/**
 * Sleep that rejects with CancellationError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError('Operation cancelled during retry delay', signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError('Operation cancelled during retry delay', signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
