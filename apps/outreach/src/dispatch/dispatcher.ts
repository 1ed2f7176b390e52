/**
 * Dispatcher: bounded worker pool over one batch of recipients.
 *
 * Records that fail validation become failure outcomes without ever taking a
 * worker. Each valid record becomes a SendTask; `maxThreads` workers pull
 * tasks from a shared cursor, compose the message, and send it with retry.
 * Every transport attempt, retries included, first acquires the rate limiter.
 *
 * Nothing thrown inside a task escapes it: every input record ends as exactly
 * one SendOutcome.
 */

import { composeMessage } from "../domain/payload-builders/email.js";
import type { ComposedMessage, CompositionContext } from "../domain/payload-builders/types.js";
import { normalizeRecipient, type RawRecipientRecord } from "../domain/recipients.js";
import { executeWithRetry, TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { isRetryableSendError, TemplateError, TransportError } from "../errors.js";
import { log } from "../logger.js";
import type { Transport } from "../providers/types.js";
import type { RateLimiter } from "../rate-limiting/types.js";
import { buildBatchSummary } from "./summary.js";
import type {
  BatchSummary,
  DispatcherConfig,
  DispatcherDeps,
  FailureReason,
  RunOptions,
  SendFailure,
  SendOutcome,
  SendTask,
} from "./types.js";

interface QueuedTask {
  index: number;
  task: SendTask;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failure(email: string, reason: FailureReason, message: string, attemptsMade: number): SendFailure {
  return { status: "failure", email, reason, message, attemptsMade };
}

/** Failure reason for an error that ended a send */
export function failureReasonFor(error: unknown): FailureReason {
  if (error instanceof TransportError) return error.code;
  if (error instanceof TemplateError) return "template_error";
  return "unexpected_error";
}

export class Dispatcher {
  private readonly maxThreads: number;
  private readonly config: DispatcherConfig;
  private readonly transport: Transport;
  private readonly rateLimiter: RateLimiter;
  private readonly composition: CompositionContext;
  private readonly delayProvider: DelayProvider;
  private readonly timeProvider: TimeProvider;

  constructor(config: DispatcherConfig, deps: DispatcherDeps) {
    this.config = config;
    this.maxThreads = Math.max(1, Math.floor(config.maxThreads));
    this.transport = deps.transport;
    this.rateLimiter = deps.rateLimiter;
    this.composition = deps.composition;
    this.delayProvider = deps.delayProvider ?? new TimeoutDelayProvider();
    this.timeProvider = deps.timeProvider ?? new SystemTimeProvider();
  }

  async run(records: RawRecipientRecord[], options: RunOptions = {}): Promise<BatchSummary> {
    const { signal, onOutcome } = options;
    const startedAt = this.timeProvider.now();
    const outcomes = new Array<SendOutcome>(records.length);
    const queue: QueuedTask[] = [];

    const settle = (index: number, outcome: SendOutcome): void => {
      outcomes[index] = outcome;
      try {
        onOutcome?.(outcome);
      } catch (error) {
        log.dispatch.warn({ to: outcome.email, error: errorMessage(error) }, "outcome listener threw");
      }
    };

    records.forEach((raw, index) => {
      const result = normalizeRecipient(raw);

      if (!result.ok) {
        const message = result.reason === "missing_email"
          ? "Email address is missing"
          : `Invalid email address: ${result.email}`;
        log.dispatch.warn({ to: result.email, reason: result.reason }, "skipped");
        settle(index, failure(result.email, result.reason, message, 0));
        return;
      }

      queue.push({ index, task: { recipient: result.recipient, attempt: 0 } });
      log.dispatch.info({ to: result.recipient.email }, "queued");
    });

    let cursor = 0;

    const worker = async (workerId: number): Promise<void> => {
      while (cursor < queue.length && !signal?.aborted) {
        const { index, task } = queue[cursor++];
        const outcome = await this.runTask(task, workerId);
        settle(index, outcome);

        const cooldownMs = this.config.postSendDelayMs ?? 0;
        if (outcome.status === "success" && cooldownMs > 0 && cursor < queue.length && !signal?.aborted) {
          await this.delayProvider.delay(cooldownMs, signal);
        }
      }
    };

    const width = Math.min(this.maxThreads, queue.length);
    log.dispatch.info(
      { total: records.length, queued: queue.length, rejected: records.length - queue.length, workers: width },
      "dispatch started"
    );

    await Promise.all(Array.from({ length: width }, (_, workerId) => worker(workerId)));

    // Tasks no worker picked up before cancellation
    for (let i = cursor; i < queue.length; i++) {
      const { index, task } = queue[i];
      settle(index, failure(task.recipient.email, "cancelled", "Run cancelled before this recipient was sent", 0));
    }
    if (cursor < queue.length) {
      log.dispatch.warn({ cancelled: queue.length - cursor }, "run cancelled");
    }

    const summary = buildBatchSummary(outcomes, this.timeProvider.now() - startedAt);
    log.dispatch.info(
      { total: summary.totalSubmitted, succeeded: summary.succeeded, failed: summary.failed },
      "dispatch finished"
    );
    return summary;
  }

  /**
   * Compose and send one task. Never throws.
   */
  private async runTask(task: SendTask, workerId: number): Promise<SendOutcome> {
    const to = task.recipient.email;

    try {
      let message: ComposedMessage;
      try {
        message = composeMessage(this.composition, task.recipient);
      } catch (error) {
        log.dispatch.error({ to, reason: failureReasonFor(error), error: errorMessage(error) }, "failed");
        return failure(to, failureReasonFor(error), errorMessage(error), 0);
      }

      const result = await executeWithRetry(
        async () => {
          task.attempt++;
          await this.rateLimiter.acquire();
          return this.transport.send(message);
        },
        {
          ...this.config.retry,
          isRetryable: isRetryableSendError,
          onRetry: (retry, error, delayMs) => {
            log.dispatch.warn(
              { to, attempt: retry, delayMs, reason: failureReasonFor(error), error: errorMessage(error) },
              "retrying"
            );
          },
        },
        this.delayProvider
      );

      if (result.success) {
        log.dispatch.info({ to, attempts: result.attempts, workerId }, "sent");
        return { status: "success", email: to, attempts: result.attempts, messageId: result.value.messageId };
      }

      const reason = failureReasonFor(result.error);
      log.dispatch.error(
        {
          to,
          reason,
          attemptsMade: result.attempts,
          retryable: result.retryable,
          ...(result.error instanceof TransportError && {
            errorCode: result.error.errorCode,
            responseCode: result.error.responseCode,
          }),
          error: errorMessage(result.error),
        },
        "failed"
      );
      return failure(to, reason, errorMessage(result.error), result.attempts);
    } catch (error) {
      log.dispatch.error({ to, attemptsMade: task.attempt, error: errorMessage(error) }, "task crashed");
      return failure(to, "unexpected_error", errorMessage(error), task.attempt);
    }
  }
}
