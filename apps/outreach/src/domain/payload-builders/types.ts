/**
 * Types for message composition.
 * Shared by the composer, the transports and the dispatcher.
 */

export interface Sender {
  address: string;
  name?: string;
}

/** Static document attached to every message, read once at startup */
export interface Attachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

/** Everything a message needs besides the recipient */
export interface CompositionContext {
  sender: Sender;
  subject: string;
  template: string;
  attachment: Attachment;
}

/** Fully assembled unit handed to a Transport */
export interface ComposedMessage {
  from: Sender;
  to: string;
  subject: string;
  text: string;
  attachments: Attachment[];
}

export type TemplateVariables = Readonly<Record<string, string>>;
