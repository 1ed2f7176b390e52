import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { ATTACHMENT_CONTENT_TYPE, runPreflight } from "../../preflight.js";
import { AuthError } from "../../errors.js";
import { FakeTransport, makeTempDir } from "../helpers/fixtures.js";

describe("runPreflight", () => {
  let temp: Awaited<ReturnType<typeof makeTempDir>>;
  let resumePath: string;
  let templatePath: string;
  const sender = { address: "me@example.com" };

  beforeEach(async () => {
    temp = await makeTempDir();
    resumePath = await temp.file("resume.pdf", "%PDF-test");
    templatePath = await temp.file("template.md", "Dear {{recipient_name}} at {{company_name}}");
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("should be ready and hand back the loaded assets", async () => {
    const result = await runPreflight({ resumePath, templatePath, sender });

    expect(result.ready).toBe(true);
    expect(result.checks.map((c) => c.name)).toEqual(["attachment", "template", "sender"]);
    expect(result.assets).toEqual({
      attachment: { filename: "resume.pdf", content: Buffer.from("%PDF-test"), contentType: ATTACHMENT_CONTENT_TYPE },
      template: "Dear {{recipient_name}} at {{company_name}}",
    });
  });

  it("should fail when the attachment is missing", async () => {
    const missing = join(temp.dir, "missing.pdf");

    const result = await runPreflight({ resumePath: missing, templatePath, sender });

    expect(result.ready).toBe(false);
    expect(result.assets).toBeUndefined();
    expect(result.checks[0]).toMatchObject({ name: "attachment", passed: false, critical: true });
    expect(result.checks[0].message).toContain(`Attachment not readable at ${missing}`);
  });

  it("should fail when the attachment path is a directory", async () => {
    const result = await runPreflight({ resumePath: temp.dir, templatePath, sender });

    expect(result.checks[0]).toMatchObject({ passed: false, message: `${temp.dir} is not a file` });
  });

  it("should fail on an empty template", async () => {
    const empty = await temp.file("empty.md", "  \n");

    const result = await runPreflight({ resumePath, templatePath: empty, sender });

    expect(result.ready).toBe(false);
    expect(result.checks[1]).toMatchObject({ name: "template", passed: false, message: `Template at ${empty} is empty` });
  });

  it("should name unknown placeholders", async () => {
    const typo = await temp.file("typo.md", "Hi {{recipient_name}} from {{compnay}}");

    const result = await runPreflight({ resumePath, templatePath: typo, sender });

    expect(result.ready).toBe(false);
    expect(result.checks[1].message).toBe(
      "Template uses unknown placeholder(s): compnay (available: recipient_name, company_name, recipient_email)"
    );
  });

  it("should only warn about a sender that is not an address", async () => {
    const result = await runPreflight({ resumePath, templatePath, sender: { address: "me" } });

    expect(result.ready).toBe(true);
    expect(result.checks[2]).toMatchObject({ name: "sender", passed: false, critical: false });
  });

  it("should skip the relay check unless asked", async () => {
    const transport = new FakeTransport();

    const result = await runPreflight({ resumePath, templatePath, sender }, { transport });

    expect(result.checks.map((c) => c.name)).not.toContain("relay");
  });

  it("should not be ready when relay verification fails", async () => {
    const transport = Object.assign(new FakeTransport(), {
      verify: async () => {
        throw new AuthError("Invalid login: 535 Authentication failed", { responseCode: 535 });
      },
    });

    const result = await runPreflight({ resumePath, templatePath, sender }, { verify: true, transport });

    expect(result.ready).toBe(false);
    expect(result.checks[3]).toEqual({
      name: "relay",
      passed: false,
      message: "Relay check failed: Invalid login: 535 Authentication failed",
      critical: true,
    });
  });

  it("should pass the relay check for a transport without a verify step", async () => {
    const result = await runPreflight({ resumePath, templatePath, sender }, { verify: true, transport: new FakeTransport() });

    expect(result.ready).toBe(true);
    expect(result.checks[3]).toMatchObject({ name: "relay", passed: true, critical: false });
  });
});
