import { formatDuration } from "../logger.js";
import type { BatchSummary, FailureEntry, SendOutcome } from "./types.js";

/**
 * Fold per-record outcomes into counts and the failure list.
 */
export function buildBatchSummary(outcomes: SendOutcome[], durationMs: number): BatchSummary {
  const failures: FailureEntry[] = [];
  let succeeded = 0;

  for (const outcome of outcomes) {
    if (outcome.status === "success") {
      succeeded++;
    } else {
      failures.push({
        email: outcome.email,
        reason: outcome.reason,
        message: outcome.message,
        attemptsMade: outcome.attemptsMade,
      });
    }
  }

  return {
    totalSubmitted: outcomes.length,
    succeeded,
    failed: failures.length,
    failures,
    outcomes,
    durationMs,
  };
}

/**
 * End-of-run report: counts, then one line per failed address.
 *
 * @example
 * Outreach finished in 4.20s
 *   submitted: 2
 *   succeeded: 1
 *   failed:    1
 * Failed recipients:
 *   - not-an-email [invalid_email] Invalid email address (0 attempts)
 */
export function formatBatchSummary(summary: BatchSummary): string {
  const lines = [
    `Outreach finished in ${formatDuration(summary.durationMs)}`,
    `  submitted: ${summary.totalSubmitted}`,
    `  succeeded: ${summary.succeeded}`,
    `  failed:    ${summary.failed}`,
  ];

  if (summary.failures.length > 0) {
    lines.push("Failed recipients:");
    for (const failure of summary.failures) {
      const email = failure.email || "(no email)";
      const attempts = failure.attemptsMade === 1 ? "1 attempt" : `${failure.attemptsMade} attempts`;
      lines.push(`  - ${email} [${failure.reason}] ${failure.message} (${attempts})`);
    }
  }

  return lines.join("\n");
}
