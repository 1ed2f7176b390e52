/**
 * Dispatch types: tasks, outcomes and the batch summary.
 */

import type { CompositionContext } from "../domain/payload-builders/types.js";
import type { RecipientRecord } from "../domain/recipients.js";
import type { DelayProvider, RetryPolicy } from "../domain/utils/retry.js";
import type { TimeProvider } from "../domain/utils/time.js";
import type { TransportErrorCode } from "../errors.js";
import type { Transport } from "../providers/types.js";
import type { RateLimiter } from "../rate-limiting/types.js";

export type FailureReason =
  | "missing_email"
  | "invalid_email"
  | "template_error"
  | TransportErrorCode
  | "cancelled"
  | "unexpected_error";

/** One unit of work per valid recipient */
export interface SendTask {
  readonly recipient: RecipientRecord;
  /** Transport attempts made so far */
  attempt: number;
}

export interface SendSuccess {
  readonly status: "success";
  readonly email: string;
  readonly attempts: number;
  readonly messageId: string;
}

export interface SendFailure {
  readonly status: "failure";
  readonly email: string;
  readonly reason: FailureReason;
  readonly message: string;
  readonly attemptsMade: number;
}

export type SendOutcome = SendSuccess | SendFailure;

export type FailureEntry = Omit<SendFailure, "status">;

export interface BatchSummary {
  /** Every input record, valid or not */
  totalSubmitted: number;
  succeeded: number;
  failed: number;
  failures: FailureEntry[];
  /** One per input record, in input order */
  outcomes: SendOutcome[];
  durationMs: number;
}

export interface DispatcherConfig {
  /** Pool width (min 1) */
  maxThreads: number;
  retry: RetryPolicy;
  /** Cooldown a worker observes after each successful send */
  postSendDelayMs?: number;
}

export interface DispatcherDeps {
  transport: Transport;
  rateLimiter: RateLimiter;
  composition: CompositionContext;
  delayProvider?: DelayProvider;
  timeProvider?: TimeProvider;
}

export interface RunOptions {
  /** Stops workers from taking new tasks; in-flight tasks finish */
  signal?: AbortSignal;
  /** Called once per outcome as soon as it is known */
  onOutcome?: (outcome: SendOutcome) => void;
}
