/**
 * CSV recipient loader (csv-parser).
 *
 * Headers are matched case-insensitively against known aliases; columns that
 * map to no field are dropped. The first column claiming a field wins.
 */

import { createReadStream, existsSync } from "node:fs";
import { Readable } from "node:stream";
import csv from "csv-parser";
import { z } from "zod";
import type { RawRecipientRecord } from "../domain/recipients.js";
import { LoaderError } from "../errors.js";
import { log } from "../logger.js";
import { describeField, fieldForHeader, missingFields } from "./columns.js";

const rowSchema = z.object({
  name: z.string().default(""),
  company: z.string().default(""),
  email: z.string().default(""),
});

/**
 * Parse recipient records from a CSV stream.
 *
 * @param source - label used in error messages
 */
export function parseRecipientCsv(input: Readable, source = "CSV input"): Promise<RawRecipientRecord[]> {
  return new Promise((resolve, reject) => {
    const records: RawRecipientRecord[] = [];
    const claimed = new Set<string>();
    let headers: Array<string | null> | null = null;
    let settled = false;

    const fail = (error: LoaderError): void => {
      if (settled) return;
      settled = true;
      input.destroy();
      reject(error);
    };

    const parser = csv({
      mapHeaders: ({ header }) => {
        const field = fieldForHeader(header);
        if (field === null || claimed.has(field)) return null;
        claimed.add(field);
        return field;
      },
    });

    input.on("error", (error) => {
      fail(new LoaderError(`Could not read ${source}: ${error.message}`, { cause: error }));
    });

    input
      .pipe(parser)
      .on("headers", (mapped: Array<string | null>) => {
        headers = mapped;
        const missing = missingFields(mapped);
        if (missing.length > 0) {
          fail(new LoaderError(`${source} is missing required column(s): ${missing.map(describeField).join("; ")}`));
        }
      })
      .on("data", (row: unknown) => {
        if (settled) return;
        const parsed = rowSchema.safeParse(row);
        if (!parsed.success) {
          log.loader.warn({ source, row: records.length + 1 }, "unreadable row skipped");
          return;
        }
        records.push(parsed.data);
      })
      .on("end", () => {
        if (settled) return;
        if (headers === null) {
          fail(new LoaderError(`${source} is empty`));
          return;
        }
        if (records.length === 0) {
          fail(new LoaderError(`${source} contains no recipient records`));
          return;
        }
        settled = true;
        resolve(records);
      })
      .on("error", (error: Error) => {
        fail(new LoaderError(`CSV parsing failed for ${source}: ${error.message}`, { cause: error }));
      });
  });
}

export function parseRecipientCsvString(content: string, source?: string): Promise<RawRecipientRecord[]> {
  return parseRecipientCsv(Readable.from([content]), source);
}

export async function loadRecipientsFromCsv(path: string): Promise<RawRecipientRecord[]> {
  if (!existsSync(path)) {
    throw new LoaderError(`CSV file not found: ${path}`);
  }

  const records = await parseRecipientCsv(createReadStream(path, { encoding: "utf8" }), path);
  log.loader.info({ path, records: records.length }, "csv loaded");
  return records;
}
