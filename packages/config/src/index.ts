import { existsSync } from "node:fs";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

const required = (key: string) => z.string({ required_error: `${key} must be set` }).trim().min(1, `${key} must be set`);

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // ===========================================================================
  // Sender identity
  // ===========================================================================
  EMAIL_USER: required("EMAIL_USER"),
  EMAIL_PASSWORD: required("EMAIL_PASSWORD"),
  EMAIL_FROM_NAME: z.string().trim().min(1).optional(),
  EMAIL_SUBJECT: z.string().trim().min(1).default("Seeking Assistance for Suitable Job Opportunity & Referral"),

  // ===========================================================================
  // Content
  // ===========================================================================
  RESUME_PATH: required("RESUME_PATH"),
  EMAIL_TEMPLATE_PATH: z.string().trim().min(1).default("email_template.md"),
  /** Where PDF extraction writes its CSV snapshot for review */
  SNAPSHOT_PATH: z.string().trim().min(1).default("recruiters_list.csv"),

  // ===========================================================================
  // Transport
  // ===========================================================================
  EMAIL_TRANSPORT: z.enum(["smtp", "mock"]).default("smtp"),
  SMTP_SERVER: z.string().trim().min(1).default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  /** Bounds connect, greeting and socket inactivity for each attempt */
  SMTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),

  // Mock transport (dry runs)
  MOCK_MODE: z.enum(["success", "fail", "random"]).default("success"),
  MOCK_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  MOCK_LATENCY_MS: z.coerce.number().min(0).default(50),

  // ===========================================================================
  // Rate Limiting
  // ===========================================================================
  // Clamped to a minimum of 1 by the limiter itself
  EMAIL_CALLS_PER_PERIOD: z.coerce.number().int().default(10),
  /** Sliding window length in seconds */
  EMAIL_PERIOD: z.coerce.number().default(60),

  // ===========================================================================
  // Dispatch
  // ===========================================================================
  MAX_EMAIL_THREADS: z.coerce.number().int().min(1).default(10),
  /** Total attempts per recipient, first attempt included */
  MAX_EMAIL_RETRIES: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().min(0).default(1000),
  RETRY_MAX_DELAY_MS: z.coerce.number().min(0).default(30_000),
  POST_SEND_DELAY_MS: z.coerce.number().min(0).default(3000),
});

export const loggingSchema = configSchema.pick({ NODE_ENV: true, LOG_LEVEL: true });

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

type Env = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigurationError";
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join(".");
    return key ? `${key}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate an environment map against the schema.
 * Pure: does not read process.env or cache anything.
 */
export function parseConfig(env: Env): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError("Missing or invalid environment variables:", formatIssues(result.error));
  }

  return Object.freeze(result.data);
}

/**
 * Logging settings only. Never throws, so the logger can come up
 * before the rest of the configuration is known to be valid.
 */
export function parseLoggingConfig(env: Env): LoggingConfig {
  const result = loggingSchema.safeParse(env);
  return result.success ? result.data : { NODE_ENV: "development" };
}

/**
 * Load a .env file into process.env. Variables already set in the
 * environment win over the file.
 */
export function loadEnvFile(path = ".env"): void {
  if (!existsSync(path)) {
    throw new ConfigurationError(`.env file not found at path: ${path}. Please create one.`);
  }

  const result = loadEnv({ path });
  if (result.error) {
    throw new ConfigurationError(`Could not read ${path}: ${result.error.message}`);
  }
}

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
