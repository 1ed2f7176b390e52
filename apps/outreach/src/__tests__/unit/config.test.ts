import { describe, it, expect } from "vitest";
import { testSettings } from "../helpers/fixtures.js";

describe("toOutreachSettings", () => {
  it("should map the environment onto runtime settings", () => {
    const settings = testSettings();

    expect(settings.sender).toEqual({ address: "me@example.com" });
    expect(settings.credentials).toEqual({ user: "me@example.com", password: "test-password" });
    expect(settings.smtp).toEqual({ host: "smtp.gmail.com", port: 587, timeoutMs: 30000 });
    expect(settings.templatePath).toBe("email_template.md");
    expect(settings.snapshotPath).toBe("recruiters_list.csv");
    expect(settings.rateLimit).toEqual({ callsPerPeriod: 10, periodMs: 60000 });
    expect(settings.dispatch).toEqual({
      maxThreads: 10,
      retry: { maxAttempts: 3, baseDelayMs: 1000, multiplier: 2, maxDelayMs: 30000 },
      postSendDelayMs: 3000,
    });
  });

  it("should convert the period from seconds", () => {
    expect(testSettings({ EMAIL_PERIOD: "2.5" }).rateLimit.periodMs).toBe(2500);
  });

  it("should carry the sender display name when set", () => {
    expect(testSettings({ EMAIL_FROM_NAME: "Sam Sender" }).sender).toEqual({
      address: "me@example.com",
      name: "Sam Sender",
    });
  });

  it("should freeze nested settings", () => {
    const settings = testSettings();

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.dispatch.retry)).toBe(true);
  });
});
