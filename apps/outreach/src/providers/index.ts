import type { OutreachSettings } from "../config.js";
import { log } from "../logger.js";
import { MockTransport } from "./mock-transport.js";
import { SmtpTransport } from "./smtp-transport.js";
import type { Transport } from "./types.js";

export * from "./types.js";
export { SmtpTransport, classifySmtpError, type SmtpTransportConfig } from "./smtp-transport.js";
export { MockTransport, type MockMode, type MockTransportConfig } from "./mock-transport.js";

export interface CreateTransportOptions {
  /** Force the mock transport regardless of EMAIL_TRANSPORT */
  dryRun?: boolean;
}

/**
 * Build the transport the settings ask for.
 */
export function createTransport(
  settings: Pick<OutreachSettings, "transport" | "smtp" | "mock" | "credentials">,
  options: CreateTransportOptions = {}
): Transport {
  if (options.dryRun || settings.transport === "mock") {
    log.transport.info({ transport: "mock", mode: settings.mock.mode }, "initialized");
    return new MockTransport(settings.mock);
  }

  log.transport.info(
    { transport: "smtp", host: settings.smtp.host, port: settings.smtp.port },
    "initialized"
  );
  return new SmtpTransport({
    host: settings.smtp.host,
    port: settings.smtp.port,
    user: settings.credentials.user,
    password: settings.credentials.password,
    timeoutMs: settings.smtp.timeoutMs,
  });
}
