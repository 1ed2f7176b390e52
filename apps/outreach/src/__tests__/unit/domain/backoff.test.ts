import { describe, it, expect } from "vitest";
import { calculateBackoff, calculateRetryDelay } from "../../../domain/utils/backoff.js";

describe("calculateBackoff", () => {
  describe("default options", () => {
    it("should return base delay for first attempt", () => {
      expect(calculateBackoff(0)).toBe(1000);
    });

    it("should double delay for each attempt", () => {
      expect(calculateBackoff(1)).toBe(2000);
      expect(calculateBackoff(2)).toBe(4000);
      expect(calculateBackoff(3)).toBe(8000);
      expect(calculateBackoff(4)).toBe(16000);
    });

    it("should cap at max delay", () => {
      expect(calculateBackoff(5)).toBe(30000); // 32000 capped to 30000
      expect(calculateBackoff(100)).toBe(30000);
    });

    it("should treat negative attempts as the first", () => {
      expect(calculateBackoff(-3)).toBe(1000);
    });
  });

  describe("custom options", () => {
    it("should respect custom base delay and multiplier", () => {
      expect(calculateBackoff(2, { baseDelayMs: 500, multiplier: 3 })).toBe(4500);
    });

    it("should respect custom max delay", () => {
      const opts = { baseDelayMs: 100, maxDelayMs: 500 };
      expect(calculateBackoff(2, opts)).toBe(400);
      expect(calculateBackoff(3, opts)).toBe(500); // capped
    });
  });
});

describe("calculateRetryDelay", () => {
  it("should wait one time unit before the first retry and two before the second", () => {
    expect(calculateRetryDelay(1)).toBe(1000);
    expect(calculateRetryDelay(2)).toBe(2000);
    expect(calculateRetryDelay(3)).toBe(4000);
  });

  it("should scale with the base delay", () => {
    expect(calculateRetryDelay(1, { baseDelayMs: 10 })).toBe(10);
    expect(calculateRetryDelay(2, { baseDelayMs: 10 })).toBe(20);
  });
});
