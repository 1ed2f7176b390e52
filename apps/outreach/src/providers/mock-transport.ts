import type { ComposedMessage } from "../domain/payload-builders/types.js";
import { TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { ConnectivityError } from "../errors.js";
import { log } from "../logger.js";
import type { SendReceipt, Transport } from "./types.js";

export type MockMode = "success" | "fail" | "random";

export interface MockTransportConfig {
  mode: MockMode;
  failureRate?: number;  // 0-1, only used in "random" mode
  latencyMs?: number;    // Simulate network delay
}

export interface MockTransportDeps {
  delayProvider?: DelayProvider;
  random?: () => number;
}

/**
 * Transport for dry runs: nothing leaves the process.
 * Simulated failures are connectivity errors, so retries are exercised too.
 */
export class MockTransport implements Transport {
  name = "mock";
  readonly sent: ComposedMessage[] = [];
  private config: Required<MockTransportConfig>;
  private delayProvider: DelayProvider;
  private random: () => number;
  private messageCounter = 0;

  constructor(config: MockTransportConfig, deps: MockTransportDeps = {}) {
    this.config = {
      mode: config.mode,
      failureRate: config.failureRate ?? 0.1,
      latencyMs: config.latencyMs ?? 50,
    };
    this.delayProvider = deps.delayProvider ?? new TimeoutDelayProvider();
    this.random = deps.random ?? Math.random;
  }

  async send(message: ComposedMessage): Promise<SendReceipt> {
    // Simulate network latency
    await this.delayProvider.delay(this.config.latencyMs);

    if (this.shouldFail()) {
      log.transport.info({ to: message.to, subject: message.subject }, "[mock] failed");
      throw new ConnectivityError("Simulated failure", { errorCode: "EMOCK" });
    }

    this.sent.push(message);
    const messageId = this.generateMessageId();
    log.transport.info({ to: message.to, messageId }, "[mock] sent");

    return { messageId, accepted: [message.to] };
  }

  async verify(): Promise<void> {
    log.transport.info({ mode: this.config.mode }, "[mock] verified");
  }

  private shouldFail(): boolean {
    switch (this.config.mode) {
      case "success":
        return false;
      case "fail":
        return true;
      case "random":
        return this.random() < this.config.failureRate;
    }
  }

  private generateMessageId(): string {
    this.messageCounter++;
    return `<mock-${this.messageCounter.toString().padStart(6, "0")}@outreach.local>`;
  }
}
