/**
 * Transport abstraction layer
 * Allows swapping between the SMTP relay and the mock transport
 */

import type { ComposedMessage } from "../domain/payload-builders/types.js";

export interface SendReceipt {
  messageId: string;
  /** Addresses the relay accepted */
  accepted: string[];
}

export interface Transport {
  /** Transport name for logging */
  name: string;

  /**
   * Hand off one message. Stateless per call: no retry inside.
   * Rejects with AuthError, ProtocolError or ConnectivityError.
   */
  send(message: ComposedMessage): Promise<SendReceipt>;

  /** Optional: check connectivity and credentials without sending */
  verify?(): Promise<void>;
}
