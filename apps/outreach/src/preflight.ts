/**
 * Preflight Checks
 *
 * Validates everything a send needs before the first recipient is touched:
 * 1. Attachment exists and is readable (read once, shared by every message)
 * 2. Template loads, is not empty, and only names placeholders we supply
 * 3. Sender address looks like an address
 * 4. Optionally, the relay accepts a connection and our credentials
 *
 * Fails fast if a critical check does not pass.
 */

import { readFile, stat } from "node:fs/promises";
import { basename } from "node:path";
import type { OutreachSettings } from "./config.js";
import { TEMPLATE_VARIABLES } from "./domain/payload-builders/email.js";
import type { Attachment } from "./domain/payload-builders/types.js";
import { isValidEmail } from "./domain/recipients.js";
import { findPlaceholders } from "./domain/utils/template.js";
import { log } from "./logger.js";
import type { Transport } from "./providers/types.js";

export const ATTACHMENT_CONTENT_TYPE = "application/octet-stream";

export interface PreflightCheck {
  name: string;
  passed: boolean;
  message: string;
  critical: boolean;
}

export interface PreflightAssets {
  attachment: Attachment;
  template: string;
}

export interface PreflightResult {
  ready: boolean;
  checks: PreflightCheck[];
  /** Present when the attachment and template both loaded */
  assets?: PreflightAssets;
}

export interface PreflightOptions {
  /** Connect to the relay and authenticate without sending */
  verify?: boolean;
  transport?: Transport;
}

type PreflightSettings = Pick<OutreachSettings, "resumePath" | "templatePath" | "sender">;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check the attachment file
 */
async function checkAttachment(path: string): Promise<{ check: PreflightCheck; attachment?: Attachment }> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return {
        check: { name: "attachment", passed: false, message: `${path} is not a file`, critical: true },
      };
    }

    const content = await readFile(path);
    return {
      check: {
        name: "attachment",
        passed: true,
        message: `Loaded ${basename(path)} (${content.length} bytes)`,
        critical: true,
      },
      attachment: { filename: basename(path), content, contentType: ATTACHMENT_CONTENT_TYPE },
    };
  } catch (error) {
    return {
      check: {
        name: "attachment",
        passed: false,
        message: `Attachment not readable at ${path}: ${describe(error)}`,
        critical: true,
      },
    };
  }
}

/**
 * Check the message template
 */
async function checkTemplate(path: string): Promise<{ check: PreflightCheck; template?: string }> {
  let template: string;
  try {
    template = await readFile(path, "utf8");
  } catch (error) {
    return {
      check: {
        name: "template",
        passed: false,
        message: `Template could not be loaded from ${path}: ${describe(error)}`,
        critical: true,
      },
    };
  }

  if (!template.trim()) {
    return {
      check: { name: "template", passed: false, message: `Template at ${path} is empty`, critical: true },
    };
  }

  const supplied: readonly string[] = TEMPLATE_VARIABLES;
  const unknown = findPlaceholders(template).filter((name) => !supplied.includes(name));
  if (unknown.length > 0) {
    return {
      check: {
        name: "template",
        passed: false,
        message: `Template uses unknown placeholder(s): ${unknown.join(", ")} (available: ${supplied.join(", ")})`,
        critical: true,
      },
    };
  }

  return {
    check: { name: "template", passed: true, message: `Loaded template from ${path}`, critical: true },
    template,
  };
}

function checkSender(address: string): PreflightCheck {
  return isValidEmail(address)
    ? { name: "sender", passed: true, message: `Sending as ${address}`, critical: true }
    : {
        name: "sender",
        passed: false,
        message: `EMAIL_USER "${address}" is not an email address; the relay may reject the From header`,
        critical: false,
      };
}

async function checkRelay(transport: Transport): Promise<PreflightCheck> {
  if (!transport.verify) {
    return { name: "relay", passed: true, message: `${transport.name} transport has no verify step`, critical: false };
  }

  try {
    await transport.verify();
    return { name: "relay", passed: true, message: `${transport.name} transport verified`, critical: true };
  } catch (error) {
    return { name: "relay", passed: false, message: `Relay check failed: ${describe(error)}`, critical: true };
  }
}

/**
 * Run all preflight checks
 */
export async function runPreflight(
  settings: PreflightSettings,
  options: PreflightOptions = {}
): Promise<PreflightResult> {
  log.system.info({}, "Running preflight checks...");

  const checks: PreflightCheck[] = [];

  const attachment = await checkAttachment(settings.resumePath);
  checks.push(attachment.check);

  const template = await checkTemplate(settings.templatePath);
  checks.push(template.check);

  checks.push(checkSender(settings.sender.address));

  if (options.verify && options.transport) {
    checks.push(await checkRelay(options.transport));
  }

  // Determine if ready (all critical checks must pass)
  const criticalFailed = checks.filter((c) => c.critical && !c.passed);
  const ready = criticalFailed.length === 0;

  // Log results
  for (const check of checks) {
    if (check.passed) {
      log.system.info({ check: check.name }, `✓ ${check.message}`);
    } else if (check.critical) {
      log.system.error({ check: check.name }, `✗ ${check.message}`);
    } else {
      log.system.warn({ check: check.name }, `⚠ ${check.message}`);
    }
  }

  if (ready) {
    log.system.info({}, "Preflight checks passed");
  } else {
    log.system.error(
      { failed: criticalFailed.map((c) => c.name) },
      "Preflight checks FAILED - nothing will be sent"
    );
  }

  const assets = attachment.attachment && template.template !== undefined
    ? { attachment: attachment.attachment, template: template.template }
    : undefined;

  return { ready, checks, ...(assets && { assets }) };
}
