/**
 * Rate Limiting Module
 *
 * Usage:
 * ```typescript
 * import { SlidingWindowRateLimiter } from "./rate-limiting/index.js";
 *
 * const limiter = new SlidingWindowRateLimiter({ callsPerPeriod: 10, periodMs: 60_000 });
 * await limiter.acquire();
 * await transport.send(message);
 * ```
 */

export * from "./types.js";
export { SlidingWindowRateLimiter } from "./sliding-window-limiter.js";
