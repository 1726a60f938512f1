import { TransientStoreError, classifyStoreError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface RetryOptions {
  /** Retries after the first attempt */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  logger?: Logger;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying with exponential backoff while it fails with a transient
 * store error. Other errors propagate on the first failure.
 */
export async function withStoreRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const log = options.logger ?? rootLogger;
  let delay = options.baseDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const classified = classifyStoreError(err);
      if (!(classified instanceof TransientStoreError) || attempt >= options.attempts) {
        throw classified;
      }
      log.warn(
        { attempt: attempt + 1, maxRetries: options.attempts, delayMs: delay, err: classified.message },
        'Store operation failed, retrying',
      );
      await sleep(delay);
      delay = Math.min(delay * 2, options.maxDelayMs);
    }
  }
}
