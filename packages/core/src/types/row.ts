/**
 * Row and table types exchanged between connectors and the reconciliation stages
 */

/** A single spreadsheet-like cell. Absent values are always `null`. */
export type CellValue = string | number | boolean | null;

/** One row, keyed by column name */
export type Row = {
  [column: string]: CellValue;
};

/**
 * An ordered set of columns plus its rows.
 * Rows may omit a column; readers treat a missing key as `null`.
 */
export interface Table {
  columns: string[];
  rows: Row[];
}

/** Result of a write operation */
export interface WriteResult {
  /** Number of rows written */
  success: number;
  /** Number of rows rejected */
  failed: number;
}
