/**
 * Left join on a key column where the right side must be unique per key.
 */

import type { Row, Table } from '@pointrec/core';
import { cell, toText } from '@pointrec/core';
import { ReconError } from '../errors/index.js';

export interface LeftJoinOptions {
  /** Name of the right-hand table, used in errors and for clashing columns */
  rightName: string;
  key?: string;
  /** Right-hand columns not carried into the result */
  dropColumns?: string[];
}

export function assertRowCount(stage: string, expected: number, actual: number): void {
  if (expected !== actual) {
    throw new ReconError({
      code: 'ROW_COUNT_CHANGED',
      message: `${stage} changed the row count from ${expected} to ${actual}`,
      suggestion: 'A join key is not unique on the right-hand side; check the source extracts for duplicates.',
      context: { stage, expected, actual },
    });
  }
}

/**
 * Index rows by key. Rows with a null key are skipped; they never join.
 */
export function indexBy(rows: Row[], key: string): Map<string, Row[]> {
  const index = new Map<string, Row[]>();
  for (const row of rows) {
    const value = toText(cell(row, key));
    if (value === null) continue;
    const bucket = index.get(value);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(value, [row]);
    }
  }
  return index;
}

export function leftJoinUnique(left: Table, right: Table, options: LeftJoinOptions): Table {
  const key = options.key ?? 'GenericPointAddress';
  const drop = new Set([key, ...(options.dropColumns ?? [])]);
  const leftColumns = new Set(left.columns);

  const carried = right.columns
    .filter((column) => !drop.has(column))
    .map((column) => ({
      source: column,
      target: leftColumns.has(column) ? `${column}_${options.rightName}` : column,
    }));

  const index = indexBy(right.rows, key);
  const duplicates: Array<{ key: string; count: number }> = [];

  const rows = left.rows.map((row) => {
    const value = toText(cell(row, key));
    const matches = value === null ? undefined : index.get(value);
    if (value !== null && matches && matches.length > 1) {
      duplicates.push({ key: value, count: matches.length });
    }
    const match = matches?.[0];
    const out: Row = { ...row };
    for (const { source, target } of carried) {
      out[target] = match ? cell(match, source) : null;
    }
    return out;
  });

  if (duplicates.length > 0) {
    throw new ReconError({
      code: 'DUPLICATE_KEY',
      message: `${duplicates.length} ${key} value(s) match more than one row of ${options.rightName}`,
      suggestion: `Remove the duplicate ${key} rows from ${options.rightName}.`,
      context: { table: options.rightName, duplicates },
    });
  }

  assertRowCount(`Join with ${options.rightName}`, left.rows.length, rows.length);
  return { columns: [...left.columns, ...carried.map((c) => c.target)], rows };
}
