/**
 * Bounded retry with exponential backoff for session handshakes.
 */

import { errorMessage, ToolrouteError } from "../util/errors";
import { warn } from "../util/logger";

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Calculate backoff delay for a given attempt number.
 * Uses exponential backoff: delay = initialDelay * 2^attempt, capped at maxDelay.
 */
export function calculateBackoff(
  attempt: number,
  options?: RetryOptions,
): number {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const delay = opts.initialDelayMs * Math.pow(2, attempt);
  return Math.min(delay, opts.maxDelayMs);
}

function isRetryable(err: unknown): boolean {
  return err instanceof ToolrouteError && err.retryable;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `attempt` until it resolves, a non-retryable error is thrown, or
 * `maxAttempts` is exhausted. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  label: string,
  attempt: (attemptNumber: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const maxAttempts = Math.max(1, opts.maxAttempts);

  for (let n = 0; ; n++) {
    try {
      return await attempt(n + 1);
    } catch (err) {
      if (n + 1 >= maxAttempts || !isRetryable(err)) throw err;

      const delay = calculateBackoff(n, opts);
      warn(
        `${label} failed (attempt ${n + 1}/${maxAttempts}): ${errorMessage(err)}; retrying in ${delay}ms`,
      );
      await sleep(delay);
    }
  }
}
