/**
 * Header normalization for tabular recipient sources.
 */

import type { RawRecipientRecord } from "../domain/recipients.js";

export type RecipientField = keyof RawRecipientRecord;

export const COLUMN_ALIASES: Readonly<Record<RecipientField, readonly string[]>> = {
  name: ["name", "recruiter_name", "full_name"],
  company: ["company", "company_name", "organization"],
  email: ["email", "recruiter_email", "email_address"],
};

/** Every field needs a column; blank cells fall back to defaults later */
export const REQUIRED_FIELDS: readonly RecipientField[] = ["name", "company", "email"];

/**
 * "  Recruiter Email " -> "recruiter_email"
 */
export function normalizeHeader(header: string): string {
  return header
    .replace(/^\uFEFF/, "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_");
}

/** Field a header maps to, or null for columns we ignore */
export function fieldForHeader(header: string): RecipientField | null {
  const normalized = normalizeHeader(header);
  for (const field of Object.keys(COLUMN_ALIASES)) {
    if (isRecipientField(field) && COLUMN_ALIASES[field].includes(normalized)) {
      return field;
    }
  }
  return null;
}

function isRecipientField(value: string): value is RecipientField {
  return value === "name" || value === "company" || value === "email";
}

/**
 * Required fields absent from a header row that has already been mapped to
 * field names (null marks a dropped column).
 */
export function missingFields(mapped: ReadonlyArray<string | null>): RecipientField[] {
  return REQUIRED_FIELDS.filter((field) => !mapped.includes(field));
}

/** "email (one of: email, recruiter_email, email_address)" */
export function describeField(field: RecipientField): string {
  return `${field} (one of: ${COLUMN_ALIASES[field].join(", ")})`;
}
