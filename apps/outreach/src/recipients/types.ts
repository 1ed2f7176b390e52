export type RecipientSource =
  | { kind: "csv"; path: string }
  | { kind: "pdf"; path: string };

export interface LoadOptions {
  /** Where PDF extraction writes its review copy; omitted means no snapshot */
  snapshotPath?: string;
}

/** Text of one PDF table cell with its horizontal extent (pt) */
export interface TableCell {
  text: string;
  x: number;
  end: number;
}

/** One row of cells recovered from a PDF table, left to right */
export type TableRow = TableCell[];
