/**
 * Generic retry with exponential backoff.
 * Fully testable with dependency injection for delays.
 */

import { calculateRetryDelay } from "./backoff.js";

export interface RetryPolicy {
  /** Total attempts, first one included (min 1) */
  maxAttempts: number;
  /** Delay before the first retry, in ms */
  baseDelayMs: number;
  /** Growth factor between consecutive retries */
  multiplier: number;
  /** Upper bound for any single delay, in ms */
  maxDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  /** Return false to stop retrying (permanent failure) */
  isRetryable?: (error: unknown) => boolean;
  /** Callback before each retry wait */
  onRetry?: (retry: number, error: unknown, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: unknown; attempts: number; retryable: boolean };

export interface DelayProvider {
  /** Resolves after `ms`, or as soon as `signal` aborts */
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return;
    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30000,
};

/**
 * Execute an operation with retry logic.
 *
 * The operation is called at most `maxAttempts` times. A rejection that
 * `isRetryable` refuses ends the loop immediately.
 *
 * @example
 * const result = await executeWithRetry(
 *   () => transport.send(message),
 *   { ...DEFAULT_RETRY_POLICY, isRetryable: isRetryableSendError }
 * );
 * if (!result.success) {
 *   log.dispatch.error({ attempts: result.attempts }, "gave up");
 * }
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const isRetryable = options.isRetryable ?? (() => true);

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { success: true, value, attempts: attempt };
    } catch (error) {
      const retryable = isRetryable(error);

      if (!retryable || attempt >= maxAttempts) {
        return { success: false, error, attempts: attempt, retryable };
      }

      const delayMs = calculateRetryDelay(attempt, {
        baseDelayMs: options.baseDelayMs,
        multiplier: options.multiplier,
        maxDelayMs: options.maxDelayMs,
      });

      options.onRetry?.(attempt, error, delayMs);
      await delayProvider.delay(delayMs);
    }
  }
}
