/**
 * Recipient validation and normalization - pure functions.
 */

export const DEFAULT_NAME = "HR";
export const DEFAULT_COMPANY = "your company";

/** Record as produced by a loader: fields may be blank, nothing validated */
export interface RawRecipientRecord {
  name: string;
  company: string;
  email: string;
}

/** Validated recipient, safe to queue */
export type RecipientRecord = Readonly<RawRecipientRecord>;

export type RecipientRejection = "missing_email" | "invalid_email";

export type NormalizeResult =
  | { ok: true; recipient: RecipientRecord }
  | { ok: false; reason: RecipientRejection; email: string };

const EMAIL_CHARS = "[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}";
const EMAIL_EXACT = new RegExp(`^${EMAIL_CHARS}$`);
const EMAIL_ANYWHERE = new RegExp(EMAIL_CHARS);

/**
 * Whether the whole string is a plausible address.
 */
export function isValidEmail(value: string): boolean {
  return EMAIL_EXACT.test(value);
}

/**
 * First address found inside free text (a table cell holding an address
 * plus a job title, for instance), or null.
 */
export function findEmail(text: string): string | null {
  const match = EMAIL_ANYWHERE.exec(text);
  return match ? match[0] : null;
}

/**
 * First whitespace-delimited token of the name, or "HR".
 */
export function normalizeName(name: string): string {
  const [first] = name.trim().split(/\s+/);
  return first ? first : DEFAULT_NAME;
}

export function normalizeCompany(company: string): string {
  const trimmed = company.trim();
  return trimmed ? trimmed : DEFAULT_COMPANY;
}

/**
 * Validate a raw record and apply name/company defaults.
 *
 * @example
 * normalizeRecipient({ name: "Jane Doe", company: " Acme ", email: "jane@acme.com" })
 * // { ok: true, recipient: { name: "Jane", company: "Acme", email: "jane@acme.com" } }
 */
export function normalizeRecipient(raw: RawRecipientRecord): NormalizeResult {
  const email = raw.email.trim();

  if (!email) {
    return { ok: false, reason: "missing_email", email };
  }

  if (!isValidEmail(email)) {
    return { ok: false, reason: "invalid_email", email };
  }

  return {
    ok: true,
    recipient: Object.freeze({
      name: normalizeName(raw.name),
      company: normalizeCompany(raw.company),
      email,
    }),
  };
}
