import { describe, it, expect } from "vitest";
import { Mutex } from "../../../domain/utils/mutex.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("Mutex", () => {
  it("should run sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section("a"), section("b"), section("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("should release the lock when a section rejects", async () => {
    const mutex = new Mutex();

    const failed = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(async () => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });

  it("should count holders and waiters", async () => {
    const mutex = new Mutex();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(() => gate);
    const second = mutex.runExclusive(async () => undefined);
    expect(mutex.waiting).toBe(2);

    release();
    await Promise.all([first, second]);
    expect(mutex.waiting).toBe(0);
  });
});
