import { describe, it, expect } from "vitest";
import { MockTimeProvider, SimulatedClock, SystemTimeProvider } from "../../../domain/utils/time.js";

describe("SystemTimeProvider", () => {
  it("should follow the system clock", () => {
    const before = Date.now();
    const now = new SystemTimeProvider().now();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });
});

describe("MockTimeProvider", () => {
  it("should start at the given time and only move when told", () => {
    const time = new MockTimeProvider(1000);
    expect(time.now()).toBe(1000);

    time.advanceBy(250);
    expect(time.now()).toBe(1250);
  });
});

describe("SimulatedClock", () => {
  it("should advance time by each delay and record it", async () => {
    const clock = new SimulatedClock();

    await clock.delay(1000);
    await clock.delay(0);
    await clock.delay(500);

    expect(clock.now()).toBe(1500);
    expect(clock.delays).toEqual([1000, 0, 500]);
  });
});
