/**
 * Writes several tables into one .xlsx workbook in a single pass
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Table } from '@pointrec/core';
import { ConnectorError, cell, toText } from '@pointrec/core';

export interface SheetLayout {
  /** Header row (1-indexed, default: 1) */
  startRow?: number;
  /** Bold the header row (default: true) */
  boldHeader?: boolean;
  /** Fixed column width, or 'auto' to fit the longest value (default: 15) */
  columnWidth?: number | 'auto';
}

export interface WorkbookSheet extends SheetLayout {
  name: string;
  table: Table;
}

const MAX_SHEET_NAME_LENGTH = 31;
const INVALID_SHEET_NAME_CHARS = /[\\/?*:[\]]/g;

/**
 * A sheet name Excel accepts and that is not yet in `taken` (compared
 * case-insensitively). The chosen name is added to `taken`.
 */
export function uniqueSheetName(name: string, taken: Set<string>): string {
  const cleaned = name
    .replace(INVALID_SHEET_NAME_CHARS, '_')
    .replace(/^'+|'+$/g, '')
    .trim()
    .slice(0, MAX_SHEET_NAME_LENGTH);
  const base = cleaned === '' ? 'Sheet' : cleaned;

  let candidate = base;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    const suffix = ` (${n})`;
    candidate = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

function fittedWidth(table: Table, column: string): number {
  let longest = column.length;
  for (const row of table.rows) {
    longest = Math.max(longest, toText(cell(row, column))?.length ?? 0);
  }
  return longest + 2;
}

/**
 * Header plus one row per table row, starting at `layout.startRow`
 */
export function fillWorksheet(sheet: ExcelJS.Worksheet, table: Table, layout: SheetLayout = {}): void {
  const startRow = layout.startRow ?? 1;
  const headerRow = sheet.getRow(startRow);
  table.columns.forEach((column, index) => {
    headerRow.getCell(index + 1).value = column;
  });
  if (layout.boldHeader !== false) {
    headerRow.font = { bold: true };
  }

  table.rows.forEach((row, rowIndex) => {
    const excelRow = sheet.getRow(startRow + 1 + rowIndex);
    table.columns.forEach((column, colIndex) => {
      excelRow.getCell(colIndex + 1).value = cell(row, column);
    });
  });

  const width = layout.columnWidth ?? 15;
  table.columns.forEach((column, index) => {
    sheet.getColumn(index + 1).width = width === 'auto' ? fittedWidth(table, column) : width;
  });
}

/**
 * Replace the file at `filePath` with a workbook holding `sheets` in order.
 * Returns the sheet names as written.
 */
export async function writeExcelWorkbook(filePath: string, sheets: WorkbookSheet[]): Promise<string[]> {
  const workbook = new ExcelJS.Workbook();
  const taken = new Set<string>();
  const names: string[] = [];

  for (const { name, table, ...layout } of sheets) {
    const sheetName = uniqueSheetName(name, taken);
    fillWorksheet(workbook.addWorksheet(sheetName), table, layout);
    names.push(sheetName);
  }

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await workbook.xlsx.writeFile(filePath);
  } catch (error) {
    throw new ConnectorError({
      code: 'WRITE_FAILED',
      message: `Failed to write workbook ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }
  return names;
}
