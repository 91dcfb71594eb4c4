/**
 * @fileoverview Async Utilities
 *
 * Shared async helper functions used across the codebase.
 *
 * @packageDocumentation
 */

/**
 * Options for withRetry function.
 */
export interface WithRetryOptions {
  /** Total number of attempts, including the first one */
  attempts: number;
  /** Fixed delay between attempts */
  delayMs: number;
  /** Decide whether a failure is worth another attempt (default: always) */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry with the failed attempt number (1-based) */
  onRetry?: (error: unknown, attempt: number) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation up to `attempts` times with a fixed delay in between.
 *
 * The last error is rethrown once attempts are exhausted, or immediately when
 * `shouldRetry` rejects it.
 *
 * @example
 * ```typescript
 * const body = await withRetry(() => download(url), { attempts: 3, delayMs: 2000 });
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: WithRetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= attempts) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      if (options.delayMs > 0) {
        await wait(options.delayMs);
      }
    }
  }
}
