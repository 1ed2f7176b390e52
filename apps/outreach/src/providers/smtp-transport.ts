/**
 * SMTP transport over nodemailer.
 *
 * Each send opens its own connection (STARTTLS on 587, implicit TLS on 465),
 * authenticates, hands off one message and closes. Failures are mapped onto
 * AuthError / ProtocolError / ConnectivityError so the dispatcher can decide
 * whether to retry.
 */

import nodemailer from "nodemailer";
import type { ComposedMessage } from "../domain/payload-builders/types.js";
import { AuthError, ConnectivityError, ProtocolError, type TransportError } from "../errors.js";
import { log } from "../logger.js";
import type { SendReceipt, Transport } from "./types.js";

export interface SmtpTransportConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  /** Applied to connect, greeting and socket inactivity */
  timeoutMs: number;
}

const IMPLICIT_TLS_PORT = 465;

const AUTH_ERROR_CODES = new Set(["EAUTH", "ENOAUTH", "EOAUTH2"]);
const AUTH_RESPONSE_CODES = new Set([530, 534, 535]);
const CONNECTIVITY_ERROR_CODES = new Set([
  "ECONNECTION",
  "ETIMEDOUT",
  "ESOCKET",
  "EDNS",
  "ETLS",
  "ECONNRESET",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "EPIPE",
]);

interface ErrorFields {
  message: string;
  code?: string;
  responseCode?: number;
}

function readErrorFields(error: unknown): ErrorFields {
  if (typeof error !== "object" || error === null) {
    return { message: String(error) };
  }

  const fields: ErrorFields = {
    message: error instanceof Error ? error.message : String(error),
  };
  if ("code" in error && typeof error.code === "string") {
    fields.code = error.code;
  }
  if ("responseCode" in error && typeof error.responseCode === "number") {
    fields.responseCode = error.responseCode;
  }
  return fields;
}

/**
 * Map a nodemailer (or socket) error onto the transport error taxonomy.
 * Anything without a recognizable code or reply code is a protocol error.
 */
export function classifySmtpError(error: unknown): TransportError {
  const { message, code, responseCode } = readErrorFields(error);
  const details = { errorCode: code, responseCode, cause: error };

  if ((code !== undefined && AUTH_ERROR_CODES.has(code)) ||
      (responseCode !== undefined && AUTH_RESPONSE_CODES.has(responseCode))) {
    return new AuthError(message, details);
  }

  if (code !== undefined && CONNECTIVITY_ERROR_CODES.has(code)) {
    return new ConnectivityError(message, details);
  }

  return new ProtocolError(message, details);
}

function toAddress(entry: string | { address: string }): string {
  return typeof entry === "string" ? entry : entry.address;
}

export class SmtpTransport implements Transport {
  name = "smtp";
  private readonly config: SmtpTransportConfig;

  constructor(config: SmtpTransportConfig) {
    this.config = config;
  }

  async send(message: ComposedMessage): Promise<SendReceipt> {
    const connection = this.connect();

    try {
      const info = await connection.sendMail({
        from: message.from.name
          ? { name: message.from.name, address: message.from.address }
          : message.from.address,
        to: message.to,
        subject: message.subject,
        text: message.text,
        attachments: message.attachments.map((attachment) => ({
          filename: attachment.filename,
          content: attachment.content,
          contentType: attachment.contentType,
        })),
      });

      log.transport.debug({ to: message.to, messageId: info.messageId }, "accepted by relay");

      return {
        messageId: info.messageId,
        accepted: info.accepted.map(toAddress),
      };
    } catch (error) {
      throw classifySmtpError(error);
    } finally {
      connection.close();
    }
  }

  async verify(): Promise<void> {
    const connection = this.connect();

    try {
      await connection.verify();
      log.transport.info({ host: this.config.host, port: this.config.port }, "relay verified");
    } catch (error) {
      throw classifySmtpError(error);
    } finally {
      connection.close();
    }
  }

  private connect() {
    const { host, port, user, password, timeoutMs } = this.config;
    const implicitTls = port === IMPLICIT_TLS_PORT;

    return nodemailer.createTransport({
      host,
      port,
      secure: implicitTls,
      requireTLS: !implicitTls,
      auth: { user, pass: password },
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    });
  }
}
