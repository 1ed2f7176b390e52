/**
 * PDF recipient loader (unpdf).
 *
 * Text items are grouped into rows by baseline and split into cells where the
 * horizontal gap between items exceeds CELL_GAP. A header row naming the
 * columns fixes where each column starts; cells of later rows are read from
 * the column they fall in, so an empty cell stays empty. Rows without an
 * address (notes, wrapped lines) are skipped.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { getDocumentProxy } from "unpdf";
import { findEmail, type RawRecipientRecord } from "../domain/recipients.js";
import { LoaderError } from "../errors.js";
import { log } from "../logger.js";
import { fieldForHeader, type RecipientField } from "./columns.js";
import type { TableCell, TableRow } from "./types.js";

/** Items whose baselines differ by less than this share a row (pt) */
export const ROW_TOLERANCE = 2;
/** Gap between items that starts a new cell (pt) */
export const CELL_GAP = 6;

export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
}

/** Column taken from a header cell; `field` is null for columns we ignore */
export interface TableColumn {
  field: RecipientField | null;
  start: number;
}

export interface TableParseResult {
  records: RawRecipientRecord[];
  skipped: TableRow[];
  /** Layout in effect after the last row, to carry onto the next page */
  columns: TableColumn[] | null;
}

function cleanText(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

export function rowText(row: TableRow): string {
  return row.map((cell) => cell.text).join(" | ");
}

/**
 * Group positioned text into table rows, top of the page first.
 */
export function groupIntoRows(items: PositionedText[]): TableRow[] {
  const lines: PositionedText[][] = [];

  const byBaseline = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
  for (const item of byBaseline) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(current[0].y - item.y) < ROW_TOLERANCE) {
      current.push(item);
    } else {
      lines.push([item]);
    }
  }

  return lines.map((line) => {
    const cells: TableCell[] = [];
    let cell: TableCell | null = null;

    for (const item of line.sort((a, b) => a.x - b.x)) {
      if (cell && item.x - cell.end > CELL_GAP) {
        cells.push(cell);
        cell = null;
      }
      cell = cell
        ? { text: `${cell.text} ${item.text}`, x: cell.x, end: item.x + item.width }
        : { text: item.text, x: item.x, end: item.x + item.width };
    }
    if (cell) cells.push(cell);

    return cells
      .map((c) => ({ ...c, text: cleanText(c.text) }))
      .filter((c) => c.text);
  });
}

/**
 * Column layout from a header row, or null when the row is not one.
 * A header names an email column and holds no address itself; the first
 * column claiming a field wins.
 */
export function detectColumns(row: TableRow): TableColumn[] | null {
  if (row.some((cell) => findEmail(cell.text) !== null)) return null;

  const claimed = new Set<RecipientField>();
  const columns = row.map((cell): TableColumn => {
    const field = fieldForHeader(cell.text);
    if (field === null || claimed.has(field)) return { field: null, start: cell.x };
    claimed.add(field);
    return { field, start: cell.x };
  });

  return claimed.has("email") ? columns : null;
}

function columnAt(columns: TableColumn[], x: number): TableColumn {
  let found = columns[0];
  for (const column of columns) {
    if (column.start - CELL_GAP <= x) found = column;
  }
  return found;
}

function recordFromColumns(row: TableRow, columns: TableColumn[]): RawRecipientRecord | null {
  const text: Record<RecipientField, string[]> = { name: [], company: [], email: [] };
  for (const cell of row) {
    const { field } = columnAt(columns, cell.x);
    if (field !== null) text[field].push(cell.text);
  }

  const email = findEmail(text.email.join(" "));
  if (email === null) return null;

  return { name: text.name.join(" "), email, company: text.company.join(" ") };
}

/**
 * Headerless tables: name is the non-numeric cells before the address cell
 * (a leading serial number is dropped), company the last cell after it.
 */
function recordFromCells(row: TableRow): RawRecipientRecord | null {
  const cells = row.map((cell) => cell.text);
  const emailIndex = cells.findIndex((cell) => findEmail(cell) !== null);
  if (emailIndex < 0) return null;

  const email = findEmail(cells[emailIndex]);
  if (email === null) return null;

  const name = cells
    .slice(0, emailIndex)
    .filter((cell) => !/^\d+\.?$/.test(cell))
    .join(" ");
  const company = cells.slice(emailIndex + 1).at(-1) ?? "";

  return { name, email, company };
}

/**
 * Turn table rows into raw records.
 *
 * Header rows set the column layout for the rows below them; `columns`
 * carries a layout over from a previous page. The address is the first one
 * found in the email column.
 *
 * @example
 * // header: No | Name | Email | Title | Company
 * // row:    1  | Jane Doe | jane@acme.com | Talent Lead | (blank)
 * // record: { name: "Jane Doe", email: "jane@acme.com", company: "" }
 */
export function parseTableRows(rows: TableRow[], columns: TableColumn[] | null = null): TableParseResult {
  const records: RawRecipientRecord[] = [];
  const skipped: TableRow[] = [];
  let layout = columns;

  for (const row of rows) {
    const header = detectColumns(row);
    if (header !== null) {
      layout = header;
      continue;
    }

    const record = layout ? recordFromColumns(row, layout) : recordFromCells(row);
    if (record === null) {
      skipped.push(row);
      continue;
    }
    records.push(record);
  }

  return { records, skipped, columns: layout };
}

async function extractPageRows(data: Uint8Array): Promise<TableRow[][]> {
  const pdf = await getDocumentProxy(data);
  const pages: TableRow[][] = [];

  for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
    const page = await pdf.getPage(pageNumber);
    const content = await page.getTextContent();
    const items: PositionedText[] = [];

    for (const item of content.items) {
      if (!("str" in item) || !item.str.trim()) continue;
      const transform: number[] = item.transform;
      items.push({ text: item.str, x: transform[4], y: transform[5], width: item.width });
    }

    pages.push(groupIntoRows(items));
  }

  return pages;
}

export async function loadRecipientsFromPdf(path: string): Promise<RawRecipientRecord[]> {
  if (!existsSync(path)) {
    throw new LoaderError(`PDF file not found: ${path}`);
  }

  let pages: TableRow[][];
  try {
    pages = await extractPageRows(new Uint8Array(await readFile(path)));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LoaderError(`Could not read PDF ${path}: ${message}`, { cause: error });
  }

  const records: RawRecipientRecord[] = [];
  let columns: TableColumn[] | null = null;
  pages.forEach((rows, index) => {
    const page = index + 1;
    if (rows.length === 0) {
      log.loader.warn({ path, page }, "no text found on page");
      return;
    }

    const result = parseTableRows(rows, columns);
    for (const row of result.skipped) {
      log.loader.warn({ path, page, row: rowText(row) }, "no email in row, skipped");
    }
    records.push(...result.records);
    columns = result.columns;
  });

  if (records.length === 0) {
    throw new LoaderError(`No recipient records could be extracted from ${path}`);
  }

  log.loader.info({ path, pages: pages.length, records: records.length }, "pdf loaded");
  return records;
}
