/**
 * Review Carry-Forward
 *
 * Operators annotate the defect workbook by hand. A new report picks those
 * annotations up from the previous one, matched row by row on a key column.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { isBlank, toText } from '@pointrec/core';
import { createExcelConnector } from '@pointrec/connector-file';
import { noopLogger, readTable, requireColumns, type ReconLogger } from '@pointrec/recon-core';
import type { MatchBy } from './args.js';

export const REVIEW_COLUMNS = ['Review Status', 'Comments'] as const;
export const POINTS_SHEET = 'Points';

/**
 * Append the review columns, blank, to every row that lacks them
 */
export function withReviewColumns(table: Table): Table {
  const columns = [...table.columns.filter((column) => !REVIEW_COLUMNS.some((r) => r === column)), ...REVIEW_COLUMNS];
  return {
    columns,
    rows: table.rows.map((row) => {
      const out: Row = { ...row };
      for (const column of REVIEW_COLUMNS) out[column] = row[column] ?? '';
      return out;
    }),
  };
}

export async function readPreviousReport(filePath: string): Promise<Table> {
  return readTable(
    createExcelConnector({ id: 'previous-report', name: 'previous report', filePath, sheet: POINTS_SHEET, readonly: true })
  );
}

function keyOf(row: Row, matchBy: MatchBy): string | null {
  const value = row[matchBy];
  return isBlank(value) ? null : toText(value);
}

export interface CarryForwardResult {
  table: Table;
  carried: number;
}

/**
 * Copy non-blank review values from `previous` onto the matching rows of `current`
 */
export function carryForwardReviews(
  current: Table,
  previous: Table,
  matchBy: MatchBy,
  logger: ReconLogger = noopLogger
): CarryForwardResult {
  requireColumns(previous, [matchBy], 'Previous report');

  const reviews = new Map<string, Row>();
  const duplicates = new Set<string>();
  for (const row of previous.rows) {
    const key = keyOf(row, matchBy);
    if (key === null) continue;
    if (reviews.has(key)) {
      duplicates.add(key);
      continue;
    }
    reviews.set(key, row);
  }
  if (duplicates.size > 0) {
    logger.warn(`Previous report has ${duplicates.size} duplicate ${matchBy} value(s); using the first row of each`, {
      duplicates: [...duplicates],
    });
  }

  let carried = 0;
  const base = withReviewColumns(current);
  const rows = base.rows.map((row) => {
    const key = keyOf(row, matchBy);
    const earlier = key === null ? undefined : reviews.get(key);
    if (!earlier) return row;

    const out: Row = { ...row };
    let copied = false;
    for (const column of REVIEW_COLUMNS) {
      const value: CellValue | undefined = earlier[column];
      if (value === undefined || isBlank(value)) continue;
      out[column] = value;
      copied = true;
    }
    if (copied) carried++;
    return out;
  });

  logger.info(`Carried review columns forward for ${carried} of ${rows.length} rows`, { matchBy, carried });
  return { table: { columns: base.columns, rows }, carried };
}
