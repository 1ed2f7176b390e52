/**
 * Time provider abstraction for testable time-dependent code.
 * Allows injecting mock time in tests.
 */

import type { DelayProvider } from "./retry.js";

export interface TimeProvider {
  /** Get current timestamp in milliseconds */
  now(): number;
}

/**
 * Default time provider using system clock.
 */
export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now();
  }
}

/**
 * Mock time provider for testing.
 * Allows controlling time in unit tests.
 */
export class MockTimeProvider implements TimeProvider {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  /** Advance time by specified milliseconds */
  advanceBy(ms: number): void {
    this.currentTime += ms;
  }
}

/**
 * Simulated clock: sleeping advances mock time instead of waiting.
 * Lets limiter and backoff tests observe exact timestamps.
 */
export class SimulatedClock extends MockTimeProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
    if (ms > 0) this.advanceBy(ms);
  }
}
