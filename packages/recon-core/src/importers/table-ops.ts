/**
 * Column-level table operations shared by the source cleaners.
 * Every function returns a new table; inputs are never modified.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, toText, unionColumns } from '@pointrec/core';
import { ReconError } from '../errors/index.js';

export function renameColumns(table: Table, renames: Record<string, string>): Table {
  const mapping = new Map(Object.entries(renames));
  const rename = (column: string): string => mapping.get(column) ?? column;

  return {
    columns: unionColumns(table.columns.map(rename)),
    rows: table.rows.map((row) => {
      const out: Row = {};
      for (const [column, value] of Object.entries(row)) {
        out[rename(column)] = value;
      }
      return out;
    }),
  };
}

export function requireColumns(table: Table, required: string[], source: string): void {
  const present = new Set(table.columns);
  const missing = required.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new ReconError({
      code: 'SOURCE_COLUMN_MISSING',
      message: `${source} is missing column(s): ${missing.join(', ')}`,
      suggestion: 'Check that the extract was produced with the expected export template.',
      context: { source, missing, columns: table.columns },
    });
  }
}

/**
 * Keep the listed columns that exist, in list order
 */
export function selectColumns(table: Table, keep: string[]): Table {
  const present = new Set(table.columns);
  const columns = keep.filter((column) => present.has(column));
  return {
    columns,
    rows: table.rows.map((row) => {
      const out: Row = {};
      for (const column of columns) {
        out[column] = cell(row, column);
      }
      return out;
    }),
  };
}

/**
 * Add or overwrite derived columns computed per row
 */
export function withColumns(
  table: Table,
  columns: string[],
  derive: (row: Row) => Record<string, CellValue>
): Table {
  return {
    columns: unionColumns(table.columns, columns),
    rows: table.rows.map((row) => ({ ...row, ...derive(row) })),
  };
}

export function filterRows(table: Table, keep: (row: Row) => boolean): Table {
  return { columns: [...table.columns], rows: table.rows.filter(keep) };
}

/**
 * `Sub/DeviceType/DeviceId/PointId`, or `null` when any part is missing
 */
export function joinAlias(row: Row, parts: string[] = ['Sub', 'DeviceType', 'DeviceId', 'PointId']): string | null {
  const texts: string[] = [];
  for (const part of parts) {
    const text = toText(cell(row, part));
    if (text === null) return null;
    texts.push(text);
  }
  return texts.join('/');
}
