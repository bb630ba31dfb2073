/**
 * Retry with exponential backoff for transient I/O failures (SMTP hiccups,
 * flaky feed servers). Attempt `n` that fails waits `baseDelayMs * 2^n`
 * before attempt `n + 1`.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { logger } from './logger.js';

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  baseDelayMs: number;
  /** Return false to fail immediately without further attempts */
  shouldRetry?: (err: unknown) => boolean;
  signal?: AbortSignal;
  /** Short label for log lines */
  label: string;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, baseDelayMs, shouldRetry, signal, label } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = shouldRetry ? shouldRetry(err) : true;
      if (!retryable || attempt >= attempts || signal?.aborted) {
        throw err;
      }

      const delayMs = baseDelayMs * 2 ** attempt;
      logger.warn({ err, attempt, attempts, retryIn: delayMs, label }, 'Attempt failed, retrying');
      await sleep(delayMs, undefined, signal ? { signal } : undefined);
    }
  }
}
