/**
 * In-process stand-ins shared by dispatch and driver tests.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "@outreach/config";
import { toOutreachSettings } from "../../config.js";
import type { ComposedMessage, CompositionContext } from "../../domain/payload-builders/types.js";
import type { SendReceipt, Transport } from "../../providers/types.js";
import type { RateLimiter } from "../../rate-limiting/types.js";

export type SendBehavior = (message: ComposedMessage, call: number) => Promise<SendReceipt>;

const accept: SendBehavior = async (message, call) => ({
  messageId: `<fake-${call}@test.local>`,
  accepted: [message.to],
});

/**
 * Transport that records every message and answers with `behavior`.
 */
export class FakeTransport implements Transport {
  name = "fake";
  readonly calls: ComposedMessage[] = [];
  private readonly behavior: SendBehavior;

  constructor(behavior: SendBehavior = accept) {
    this.behavior = behavior;
  }

  async send(message: ComposedMessage): Promise<SendReceipt> {
    this.calls.push(message);
    return this.behavior(message, this.calls.length);
  }

  recipients(): string[] {
    return this.calls.map((m) => m.to);
  }
}

/** Limiter that never waits, counting grants */
export class CountingRateLimiter implements RateLimiter {
  acquired = 0;

  async acquire(): Promise<number> {
    this.acquired++;
    return 0;
  }
}

export function testComposition(overrides: Partial<CompositionContext> = {}): CompositionContext {
  return {
    sender: { address: "me@example.com" },
    subject: "Hello",
    template: "Dear {{recipient_name}} at {{company_name}}",
    attachment: {
      filename: "resume.pdf",
      content: Buffer.from("%PDF-test"),
      contentType: "application/octet-stream",
    },
    ...overrides,
  };
}

export function record(email: string, name = "Jane Doe", company = "Acme") {
  return { name, company, email };
}

/** Temp directory, removed by the returned cleanup */
export async function makeTempDir(): Promise<{ dir: string; file: (name: string, content: string | Buffer) => Promise<string>; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "outreach-test-"));
  return {
    dir,
    file: async (name, content) => {
      const path = join(dir, name);
      await writeFile(path, content);
      return path;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/** Settings from a minimal valid environment plus overrides */
export function testSettings(env: Record<string, string> = {}) {
  return toOutreachSettings(
    parseConfig({
      NODE_ENV: "test",
      EMAIL_USER: "me@example.com",
      EMAIL_PASSWORD: "test-password",
      RESUME_PATH: "resume.pdf",
      ...env,
    })
  );
}
