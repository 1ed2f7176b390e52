/**
 * Sliding-window rate limiter.
 *
 * Keeps the timestamps of recent grants. A caller is admitted when fewer than
 * `callsPerPeriod` grants fall inside the trailing `periodMs` window; otherwise
 * it sleeps until the oldest grant leaves the window.
 *
 * The whole check-prune-append sequence, wait included, runs under one mutex,
 * so waiting callers are admitted strictly in arrival order.
 */

import { Mutex } from "../domain/utils/mutex.js";
import { TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";
import {
  MIN_CALLS_PER_PERIOD,
  MIN_PERIOD_MS,
  type RateLimitConfig,
  type RateLimiter,
  type RateLimiterDeps,
} from "./types.js";

export class SlidingWindowRateLimiter implements RateLimiter {
  readonly callsPerPeriod: number;
  readonly periodMs: number;

  private readonly window: number[] = [];
  private readonly mutex = new Mutex();
  private readonly timeProvider: TimeProvider;
  private readonly delayProvider: DelayProvider;

  constructor(config: RateLimitConfig, deps: RateLimiterDeps = {}) {
    this.callsPerPeriod = Math.max(MIN_CALLS_PER_PERIOD, Math.floor(config.callsPerPeriod));
    this.periodMs = Math.max(MIN_PERIOD_MS, config.periodMs);
    this.timeProvider = deps.timeProvider ?? new SystemTimeProvider();
    this.delayProvider = deps.delayProvider ?? new TimeoutDelayProvider();
  }

  acquire(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let now = this.timeProvider.now();
      this.prune(now);

      while (this.window.length >= this.callsPerPeriod) {
        const waitMs = this.periodMs - (now - this.window[0]);
        if (waitMs > 0) {
          log.rateLimit.debug(
            { waitMs, inWindow: this.window.length, queued: this.mutex.waiting - 1 },
            "waiting for slot"
          );
          await this.delayProvider.delay(waitMs);
        }
        now = this.timeProvider.now();
        this.prune(now);
      }

      this.window.push(now);
      return now;
    });
  }

  /** Grants currently inside the window ending at `now` */
  inWindow(now: number = this.timeProvider.now()): number {
    return this.window.filter((t) => t > now - this.periodMs).length;
  }

  private prune(now: number): void {
    const cutoff = now - this.periodMs;
    while (this.window.length > 0 && this.window[0] <= cutoff) {
      this.window.shift();
    }
  }
}
