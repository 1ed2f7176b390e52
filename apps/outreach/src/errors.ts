/**
 * Error taxonomy.
 *
 * Startup errors (usage, preflight, loading) abort the run before any send.
 * Transport errors are caught at the task boundary and become failure
 * outcomes; `retryable` decides whether the dispatcher tries again.
 */

export { ConfigurationError } from "@outreach/config";

export abstract class OutreachError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// =============================================================================
// Startup
// =============================================================================

/** Bad command line: exits with status 2 */
export class UsageError extends OutreachError {
  readonly code = "usage";
}

/** Preflight refused to start */
export class StartupError extends OutreachError {
  readonly code = "startup";
}

/** Recipient source unreadable, malformed or empty */
export class LoaderError extends OutreachError {
  readonly code = "loader";
}

// =============================================================================
// Composition
// =============================================================================

export class TemplateError extends OutreachError {
  readonly code = "template";

  constructor(readonly missing: string[]) {
    super(`Template is missing values for: ${missing.join(", ")}`);
  }
}

// =============================================================================
// Transport
// =============================================================================

export type TransportErrorKind = "auth" | "protocol" | "connectivity";
export type TransportErrorCode = "auth_error" | "protocol_error" | "connectivity_error";

export interface TransportErrorDetails {
  /** Library or socket error code, e.g. EAUTH, ETIMEDOUT */
  errorCode?: string;
  /** SMTP reply code, e.g. 421, 550 */
  responseCode?: number;
  cause?: unknown;
}

export abstract class TransportError extends OutreachError {
  abstract readonly code: TransportErrorCode;
  abstract readonly kind: TransportErrorKind;
  abstract readonly retryable: boolean;
  readonly errorCode?: string;
  readonly responseCode?: number;

  constructor(message: string, details: TransportErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.errorCode = details.errorCode;
    this.responseCode = details.responseCode;
  }
}

/** Credentials rejected. Every later attempt would fail the same way. */
export class AuthError extends TransportError {
  readonly code = "auth_error";
  readonly kind = "auth";
  readonly retryable = false;
}

/**
 * Relay answered with an error. 4xx replies (and replies without a code)
 * are temporary; 5xx replies are permanent.
 */
export class ProtocolError extends TransportError {
  readonly code = "protocol_error";
  readonly kind = "protocol";
  readonly retryable: boolean;

  constructor(message: string, details: TransportErrorDetails = {}) {
    super(message, details);
    this.retryable = details.responseCode === undefined || details.responseCode < 500;
  }
}

/** Could not reach or keep talking to the relay */
export class ConnectivityError extends TransportError {
  readonly code = "connectivity_error";
  readonly kind = "connectivity";
  readonly retryable = true;
}

/**
 * Whether a failed send attempt is worth repeating.
 * Errors from outside the taxonomy are treated as transient.
 */
export function isRetryableSendError(error: unknown): boolean {
  if (error instanceof TransportError) return error.retryable;
  if (error instanceof TemplateError) return false;
  return true;
}
