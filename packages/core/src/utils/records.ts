/**
 * Helpers for reading cells and shaping rows
 */

import type { CellValue, Row, Table } from '../types/index.js';

/**
 * True for the null markers a source can produce: `null`, `undefined` and `NaN`
 */
export function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Read a cell, mapping an absent key or NaN to `null`
 */
export function cell(row: Row, column: string): CellValue {
  const value = row[column];
  return isMissing(value) ? null : value;
}

/**
 * Cell rendered as text, or `null` when missing
 */
export function toText(value: CellValue | undefined): string | null {
  if (isMissing(value)) return null;
  return typeof value === 'string' ? value : String(value);
}

/**
 * True when the value is missing or only whitespace
 */
export function isBlank(value: CellValue | undefined): boolean {
  const text = toText(value);
  return text === null || text.trim() === '';
}

/**
 * Convert an arbitrary driver or parser value into a cell
 */
export function toCellValue(value: unknown): CellValue {
  if (isMissing(value)) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

/**
 * Extract all unique column names from rows, in first-seen order
 */
export function extractColumnNames(rows: Row[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return Array.from(columns);
}

/**
 * Merge column lists, keeping the first occurrence of each name
 */
export function unionColumns(...lists: string[][]): string[] {
  return Array.from(new Set(lists.flat()));
}

/**
 * Copy of `table` whose rows carry every column (missing keys become `null`)
 */
export function normalizeTable(table: Table): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => {
      const out: Row = {};
      for (const column of table.columns) {
        out[column] = cell(row, column);
      }
      return out;
    }),
  };
}
