/**
 * Batch driver: preflight, load recipients, dispatch, summarize.
 *
 * Every step before dispatch is fatal on failure; nothing is sent unless the
 * attachment, the template and the recipient list are all in hand.
 */

import type { OutreachSettings } from "./config.js";
import { Dispatcher } from "./dispatch/dispatcher.js";
import { formatBatchSummary } from "./dispatch/summary.js";
import type { BatchSummary, SendOutcome } from "./dispatch/types.js";
import type { DelayProvider } from "./domain/utils/retry.js";
import type { TimeProvider } from "./domain/utils/time.js";
import { StartupError } from "./errors.js";
import { formatDuration, log, withRun } from "./logger.js";
import { runPreflight } from "./preflight.js";
import { createTransport } from "./providers/index.js";
import type { Transport } from "./providers/types.js";
import { SlidingWindowRateLimiter } from "./rate-limiting/sliding-window-limiter.js";
import { loadRecipients } from "./recipients/index.js";
import type { RecipientSource } from "./recipients/types.js";

export interface OutreachRunOptions {
  source: RecipientSource;
  /** Use the mock transport: nothing leaves the process */
  dryRun?: boolean;
  /** Check the relay connection during preflight */
  verify?: boolean;
  signal?: AbortSignal;
  onOutcome?: (outcome: SendOutcome) => void;

  // Injection points, defaulting to the real thing
  transport?: Transport;
  timeProvider?: TimeProvider;
  delayProvider?: DelayProvider;
}

export interface OutreachReport {
  summary: BatchSummary;
  /** Human-readable end-of-run report */
  text: string;
}

export async function runOutreach(
  settings: Readonly<OutreachSettings>,
  options: OutreachRunOptions
): Promise<OutreachReport> {
  return withRun(async () => {
    const transport = options.transport ?? createTransport(settings, { dryRun: options.dryRun });

    log.cli.info(
      {
        source: options.source.path,
        kind: options.source.kind,
        transport: transport.name,
        threads: settings.dispatch.maxThreads,
        callsPerPeriod: settings.rateLimit.callsPerPeriod,
        period: formatDuration(settings.rateLimit.periodMs),
      },
      "outreach starting"
    );

    const preflight = await runPreflight(settings, { verify: options.verify, transport });
    if (!preflight.ready || !preflight.assets) {
      const failed = preflight.checks.filter((c) => c.critical && !c.passed).map((c) => c.message);
      throw new StartupError(`Preflight failed:\n${failed.map((m) => `  - ${m}`).join("\n")}`);
    }

    const records = await loadRecipients(options.source, {
      snapshotPath: options.source.kind === "pdf" ? settings.snapshotPath : undefined,
    });

    const rateLimiter = new SlidingWindowRateLimiter(settings.rateLimit, {
      timeProvider: options.timeProvider,
      delayProvider: options.delayProvider,
    });

    const dispatcher = new Dispatcher(
      {
        maxThreads: settings.dispatch.maxThreads,
        retry: settings.dispatch.retry,
        postSendDelayMs: settings.dispatch.postSendDelayMs,
      },
      {
        transport,
        rateLimiter,
        composition: {
          sender: settings.sender,
          subject: settings.subject,
          template: preflight.assets.template,
          attachment: preflight.assets.attachment,
        },
        timeProvider: options.timeProvider,
        delayProvider: options.delayProvider,
      }
    );

    const summary = await dispatcher.run(records, {
      signal: options.signal,
      onOutcome: options.onOutcome,
    });

    log.cli.info(
      {
        total: summary.totalSubmitted,
        succeeded: summary.succeeded,
        failed: summary.failed,
        duration: formatDuration(summary.durationMs),
      },
      "outreach finished"
    );

    return { summary, text: formatBatchSummary(summary) };
  });
}
