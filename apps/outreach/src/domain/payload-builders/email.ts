/**
 * Email message builder - pure function.
 * Builds the message for one recipient from the shared composition context.
 */

import type { RecipientRecord } from "../recipients.js";
import { renderTemplate } from "../utils/template.js";
import type { ComposedMessage, CompositionContext, TemplateVariables } from "./types.js";

/** Placeholders the composer fills for every recipient */
export const TEMPLATE_VARIABLES = ["recipient_name", "company_name", "recipient_email"] as const;

export function buildTemplateVariables(recipient: RecipientRecord): TemplateVariables {
  return {
    recipient_name: recipient.name,
    company_name: recipient.company,
    recipient_email: recipient.email,
  };
}

/**
 * Compose the message for one recipient.
 *
 * Same inputs always give the same message; the attachment buffer is
 * shared, not copied.
 *
 * @throws TemplateError when the template names a placeholder that has no value
 *
 * @example
 * const message = composeMessage(context, { name: "Jane", company: "Acme", email: "jane@acme.com" });
 * // message.to === "jane@acme.com", message.attachments[0] === context.attachment
 */
export function composeMessage(context: CompositionContext, recipient: RecipientRecord): ComposedMessage {
  return {
    from: context.sender,
    to: recipient.email,
    subject: context.subject,
    text: renderTemplate(context.template, buildTemplateVariables(recipient)),
    attachments: [context.attachment],
  };
}
