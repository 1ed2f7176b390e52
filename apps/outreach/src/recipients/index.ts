import type { RawRecipientRecord } from "../domain/recipients.js";
import { log } from "../logger.js";
import { loadRecipientsFromCsv } from "./csv-loader.js";
import { loadRecipientsFromPdf } from "./pdf-loader.js";
import { writeSnapshot } from "./snapshot.js";
import type { LoadOptions, RecipientSource } from "./types.js";

export * from "./types.js";
export * from "./columns.js";
export { loadRecipientsFromCsv, parseRecipientCsv, parseRecipientCsvString } from "./csv-loader.js";
export {
  loadRecipientsFromPdf,
  parseTableRows,
  groupIntoRows,
  detectColumns,
  rowText,
  type PositionedText,
  type TableColumn,
} from "./pdf-loader.js";
export { formatSnapshot, writeSnapshot } from "./snapshot.js";

/**
 * Load raw recipient records from the selected source.
 * PDF extraction also writes a CSV snapshot when `snapshotPath` is given.
 *
 * @throws LoaderError when the source is missing, unreadable or yields no records
 */
export async function loadRecipients(
  source: RecipientSource,
  options: LoadOptions = {}
): Promise<RawRecipientRecord[]> {
  switch (source.kind) {
    case "csv":
      return loadRecipientsFromCsv(source.path);

    case "pdf": {
      const records = await loadRecipientsFromPdf(source.path);
      if (options.snapshotPath) {
        await writeSnapshot(options.snapshotPath, records);
        log.loader.info({ path: options.snapshotPath, records: records.length }, "snapshot written");
      }
      return records;
    }
  }
}
