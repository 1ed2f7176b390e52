import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { parseLoggingConfig } from "@outreach/config";

const loggingConfig = parseLoggingConfig(process.env);
const isDev = loggingConfig.NODE_ENV === "development";

// =============================================================================
// Run Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage propagates the runId through every task of a batch
// without passing it around by hand.
//
// Usage:
//   await withRun(async () => {
//     log.dispatch.info({ total: 10 }, "starting"); // runId added automatically
//     await dispatcher.run(records);                 // nested logs share the runId
//   });
// =============================================================================

interface RunContext {
  runId: string;
}

const runStorage = new AsyncLocalStorage<RunContext>();

/**
 * Generate a short, unique run ID (12 chars, base64url)
 */
export function generateRunId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

/**
 * Run an async function inside a run context. All logs within carry the runId.
 */
export async function withRun<T>(fn: () => Promise<T>, runId?: string): Promise<T> {
  const ctx: RunContext = { runId: runId ?? generateRunId() };
  return runStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.dispatch.info({ to: "x@y.com", attempts: 1 }, "sent")
//
// FAILURE (detailed, error level):
//   log.dispatch.error({ to, reason, attemptsMade, error: err.message }, "failed")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: loggingConfig.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  mixin() {
    const runId = runStorage.getStore()?.runId;
    return runId ? { runId } : {};
  },
};

// Pretty printing in development only
export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Command line and run lifecycle
  cli: logger.child({ component: "cli" }),

  // Recipient loading (CSV, PDF, snapshot)
  loader: logger.child({ component: "loader" }),

  // Worker pool, retries and outcomes
  dispatch: logger.child({ component: "dispatch" }),

  // Sliding-window limiter
  rateLimit: logger.child({ component: "rate-limiter" }),

  // SMTP and mock transports
  transport: logger.child({ component: "transport" }),

  // Startup checks and process-level events
  system: logger.child({ component: "system" }),
};

/**
 * Change the level of the root logger and every component logger.
 * The logger comes up before the .env file is read, so the CLI applies
 * LOG_LEVEL from it afterwards.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of Object.values(log)) {
    child.level = level;
  }
}

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: keyof typeof log,
  event: string,
  error: Error | unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Human-readable duration: "850ms", "12.40s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export default log;
