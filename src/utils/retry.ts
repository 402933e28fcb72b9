/**
 * Bounded retry with exponential backoff for calls to the identity provider.
 */

import { setTimeout as delay } from "node:timers/promises";

export interface RetryOptions {
  /** Additional attempts after the first one */
  retries: number;
  /** Delay before the first retry; doubled for each following one */
  baseDelayMs: number;
  signal?: AbortSignal;
  /** Only errors accepted here are retried. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let attempt = 0;

  for (;;) {
    options.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (attempt >= options.retries || options.signal?.aborted || !retryable) {
        throw error;
      }

      const delayMs = options.baseDelayMs * 2 ** attempt;
      attempt++;
      options.onRetry?.(error, attempt, delayMs);
      await delay(delayMs, undefined, { signal: options.signal });
    }
  }
}
