import type { Config } from "@outreach/config";
import type { Sender } from "./domain/payload-builders/types.js";
import type { RetryPolicy } from "./domain/utils/retry.js";
import type { MockMode } from "./providers/mock-transport.js";
import type { RateLimitConfig } from "./rate-limiting/types.js";

/**
 * Runtime settings derived from the validated environment.
 * Built once at startup and shared read-only by every component.
 */
export interface OutreachSettings {
  sender: Sender;
  credentials: { user: string; password: string };
  subject: string;

  resumePath: string;
  templatePath: string;
  snapshotPath: string;

  transport: "smtp" | "mock";
  smtp: { host: string; port: number; timeoutMs: number };
  mock: { mode: MockMode; failureRate: number; latencyMs: number };

  rateLimit: RateLimitConfig;
  dispatch: {
    maxThreads: number;
    retry: RetryPolicy;
    postSendDelayMs: number;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function toOutreachSettings(config: Config): Readonly<OutreachSettings> {
  return deepFreeze({
    sender: {
      address: config.EMAIL_USER,
      ...(config.EMAIL_FROM_NAME !== undefined && { name: config.EMAIL_FROM_NAME }),
    },
    credentials: { user: config.EMAIL_USER, password: config.EMAIL_PASSWORD },
    subject: config.EMAIL_SUBJECT,

    resumePath: config.RESUME_PATH,
    templatePath: config.EMAIL_TEMPLATE_PATH,
    snapshotPath: config.SNAPSHOT_PATH,

    transport: config.EMAIL_TRANSPORT,
    smtp: { host: config.SMTP_SERVER, port: config.SMTP_PORT, timeoutMs: config.SMTP_TIMEOUT_MS },
    mock: {
      mode: config.MOCK_MODE,
      failureRate: config.MOCK_FAILURE_RATE,
      latencyMs: config.MOCK_LATENCY_MS,
    },

    rateLimit: {
      callsPerPeriod: config.EMAIL_CALLS_PER_PERIOD,
      periodMs: config.EMAIL_PERIOD * 1000,
    },
    dispatch: {
      maxThreads: config.MAX_EMAIL_THREADS,
      retry: {
        maxAttempts: config.MAX_EMAIL_RETRIES,
        baseDelayMs: config.RETRY_BASE_DELAY_MS,
        multiplier: 2,
        maxDelayMs: config.RETRY_MAX_DELAY_MS,
      },
      postSendDelayMs: config.POST_SEND_DELAY_MS,
    },
  });
}
