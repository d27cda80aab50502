import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Attempts after the first. Default 3. */
  maxRetries?: number;
  /** Default 1000. */
  baseDelayMs?: number;
  /** Default 10000. */
  maxDelayMs?: number;
  /** Whether a failure earns another attempt. Defaults to {@link isTransient}. */
  retryOn?: (error: unknown) => boolean;
  /** Called before each retry with the failure that triggered it. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Source of jitter in [0, 1). */
  random?: () => number;
}

/**
 * Bad input (4xx) is final. Upstream failures (5xx) and anything that is not
 * an AppError, such as a dropped connection, may succeed on a second try.
 */
export function isTransient(error: unknown): boolean {
  return AppError.isAppError(error) ? error.isUpstream : true;
}

/**
 * Exponential backoff with jitter:
 * min(maxDelay, baseDelay * 2^attempt) * (0.5 + random / 2)
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  return Math.floor(capped * (0.5 + random() / 2));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it resolves, a failure is not worth retrying, or
 * `maxRetries` extra attempts are spent. The last failure is rethrown as is.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 1_000,
    maxDelayMs = 10_000,
    retryOn = isTransient,
    onRetry,
    random,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries || !retryOn(error)) throw error;

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs, random);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
