import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logging/logger";

export type RetryOptions = {
  attempts: number;
  baseDelayMs?: number;
  label?: string;
  logger?: Logger;
  /** Errors for which this returns false are rethrown at once. */
  shouldRetry?: (err: unknown) => boolean;
};

/**
 * Runs `fn` up to `attempts` times with exponential backoff
 * (baseDelayMs, 2x, 4x, ...). The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const baseDelayMs = options.baseDelayMs ?? 200;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === attempts || options.shouldRetry?.(err) === false) break;

      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      options.logger?.warn("Storage call failed, retrying", {
        label: options.label,
        attempt,
        delayMs,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
