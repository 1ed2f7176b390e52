/**
 * Pure utility functions for exponential backoff calculation.
 * These are fully unit-testable with no side effects.
 */

export interface BackoffOptions {
  /** Base delay in milliseconds, one "time unit" (default: 1000) */
  baseDelayMs?: number;
  /** Growth factor per retry (default: 2) */
  multiplier?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30000,
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - 0-indexed, so the wait before the first retry is attempt 0
 *
 * @example
 * // Default: 1s, 2s, 4s, 8s, 16s, 30s (capped)
 * calculateBackoff(0) // 1000
 * calculateBackoff(1) // 2000
 * calculateBackoff(5) // 30000 (capped)
 *
 * @example
 * calculateBackoff(2, { baseDelayMs: 500, multiplier: 3 }) // 4500
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, multiplier, maxDelayMs } = {
    ...DEFAULT_BACKOFF_OPTIONS,
    ...options,
  };

  const exponentialDelay = baseDelayMs * Math.pow(multiplier, Math.max(0, attempt));
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Delay before retry `k` of a send, where k is 1 for the second attempt.
 * Retry k waits multiplier^(k-1) time units.
 */
export function calculateRetryDelay(retry: number, options?: BackoffOptions): number {
  return calculateBackoff(retry - 1, options);
}
