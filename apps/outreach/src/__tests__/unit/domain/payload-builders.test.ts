import { describe, it, expect } from "vitest";
import {
  buildTemplateVariables,
  composeMessage,
} from "../../../domain/payload-builders/index.js";
import type { CompositionContext } from "../../../domain/payload-builders/index.js";
import { TemplateError } from "../../../errors.js";

const context: CompositionContext = {
  sender: { address: "me@example.com", name: "Sam Sender" },
  subject: "Hello",
  template: "Dear {{recipient_name}}, I would love to join {{ company_name }}. ({{recipient_email}})",
  attachment: {
    filename: "resume.pdf",
    content: Buffer.from("%PDF-test"),
    contentType: "application/octet-stream",
  },
};

const recipient = { name: "Jane", company: "Acme", email: "jane@acme.com" };

describe("buildTemplateVariables", () => {
  it("should expose name, company and email", () => {
    expect(buildTemplateVariables(recipient)).toEqual({
      recipient_name: "Jane",
      company_name: "Acme",
      recipient_email: "jane@acme.com",
    });
  });
});

describe("composeMessage", () => {
  it("should build the full message", () => {
    const message = composeMessage(context, recipient);

    expect(message.from).toEqual({ address: "me@example.com", name: "Sam Sender" });
    expect(message.to).toBe("jane@acme.com");
    expect(message.subject).toBe("Hello");
    expect(message.text).toBe("Dear Jane, I would love to join Acme. (jane@acme.com)");
    expect(message.attachments).toHaveLength(1);
    expect(message.attachments[0]).toBe(context.attachment);
    expect(message.attachments[0].contentType).toBe("application/octet-stream");
  });

  it("should be idempotent", () => {
    expect(composeMessage(context, recipient)).toEqual(composeMessage(context, recipient));
  });

  it("should throw TemplateError for unknown placeholders", () => {
    const broken = { ...context, template: "Hi {{recruiter_title}}" };
    expect(() => composeMessage(broken, recipient)).toThrow(TemplateError);
  });
});
