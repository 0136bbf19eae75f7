import { logger } from './logger';
import { PublishResult } from '../types';

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a call against a timer. The timer is always cleared so a finished
 * call leaves nothing pending on the event loop.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Wait for ms, or less when the signal aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  // Retries after the first attempt
  maxRetries: number;
  baseDelayMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  // Aborting stops further attempts; the last result is returned as is
  signal?: AbortSignal;
}

export interface PublishOutcome {
  result: PublishResult;
  attempts: number;
}

/**
 * Publish with exponential backoff (base, 2x base, 4x base, ...). Only
 * transient failures are retried; duplicates, permission errors and
 * usage-cap rejections come back after the first attempt. An aborted
 * signal ends the backoff early without another attempt.
 */
export async function publishWithRetry(
  publish: (text: string) => Promise<PublishResult>,
  text: string,
  options: RetryOptions,
): Promise<PublishOutcome> {
  const wait = options.sleep || sleep;
  let attempts = 0;
  for (;;) {
    attempts++;
    const result = await publish(text);
    if (result.success) return { result, attempts };

    const retryable = result.errorKind === 'transient' && !result.usageCapExceeded;
    if (!retryable || attempts > options.maxRetries || options.signal?.aborted) {
      if (retryable) {
        logger.error(`Publish failed after ${attempts} attempts: ${result.message || 'unknown error'}`);
      }
      return { result, attempts };
    }

    const delay = options.baseDelayMs * Math.pow(2, attempts - 1);
    logger.warn(`Publish attempt ${attempts} failed (${result.message || 'transient error'}); retrying in ${delay}ms`);
    await wait(delay, options.signal);
    if (options.signal?.aborted) {
      logger.warn(`Publish retry abandoned after ${attempts} attempt(s): shutting down`);
      return { result, attempts };
    }
  }
}
