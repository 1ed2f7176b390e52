/**
 * Rate Limiting Types
 */

import type { DelayProvider } from "../domain/utils/retry.js";
import type { TimeProvider } from "../domain/utils/time.js";

export interface RateLimitConfig {
  /** Grants allowed inside any trailing window (clamped to >= 1) */
  callsPerPeriod: number;
  /** Window length in ms (clamped to >= 1000) */
  periodMs: number;
}

export interface RateLimiterDeps {
  timeProvider?: TimeProvider;
  delayProvider?: DelayProvider;
}

/** Anything that can hold a caller back until a send is permitted */
export interface RateLimiter {
  /** Resolves with the timestamp recorded for this grant */
  acquire(): Promise<number>;
}

export const MIN_CALLS_PER_PERIOD = 1;
export const MIN_PERIOD_MS = 1000;
