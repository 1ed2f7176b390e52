import { writeFile } from "node:fs/promises";
import type { RawRecipientRecord } from "../domain/recipients.js";

const SNAPSHOT_HEADER = "Name,Email,Company";

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatSnapshot(records: readonly RawRecipientRecord[]): string {
  const rows = records.map((r) => [r.name, r.email, r.company].map(escapeCsvField).join(","));
  return [SNAPSHOT_HEADER, ...rows].join("\n") + "\n";
}

/**
 * Write extracted records as CSV so they can be reviewed, or fed back in
 * with --csv.
 */
export async function writeSnapshot(path: string, records: readonly RawRecipientRecord[]): Promise<void> {
  await writeFile(path, formatSnapshot(records), "utf8");
}
