/**
 * Excel Connector
 * Reads one worksheet of an .xlsx workbook and rewrites it in place,
 * leaving the workbook's other sheets untouched
 */

import ExcelJS from 'exceljs';
import type { CellValue, Row, Table } from '@pointrec/core';
import { ConnectorError } from '@pointrec/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';
import { fillWorksheet } from './excel-workbook.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
  /** Header row (1-indexed, default: 1) */
  startRow?: number;
  /** Bold the header row on write (default: true) */
  boldHeader?: boolean;
  /** Column width applied on write, or 'auto' to fit the longest value */
  columnWidth?: number | 'auto';
}

const FORBIDDEN_COLUMN_NAMES = new Set(['__proto__', 'prototype', 'constructor']);

function formulaResultToCell(result: unknown): CellValue {
  if (result instanceof Date) return result.toISOString();
  if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') {
    return result;
  }
  return null; // #N/A, #REF! and friends
}

/**
 * Normalize an ExcelJS cell value (formula, rich text, hyperlink, date, error)
 */
export function normalizeExcelValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== 'object') return value;

  if ('result' in value) return formulaResultToCell(value.result);
  if ('richText' in value) return value.richText.map((rt) => rt.text).join('');
  if ('hyperlink' in value) {
    const text: unknown = value.text;
    return typeof text === 'string' ? text : value.hyperlink;
  }
  return null;
}

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  private _workbook: ExcelJS.Workbook | null = null;

  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseContent(content: Buffer): Promise<Table> {
    this._workbook = new ExcelJS.Workbook();
    await this._workbook.xlsx.load(content);

    const sheet = this.getSheet();
    if (!sheet && this.config.createIfMissing) {
      return { columns: [], rows: [] };
    }
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
        context: { filePath: this.config.filePath },
      });
    }

    const startRow = this.config.startRow ?? 1;

    const headers: (string | undefined)[] = [];
    sheet.getRow(startRow).eachCell({ includeEmpty: false }, (c, colNumber) => {
      if (c.isMerged && c.master.address !== c.address) return;
      const header = normalizeExcelValue(c.value);
      headers[colNumber - 1] = header === null ? undefined : String(header).trim();
    });

    for (const header of headers) {
      if (header !== undefined && FORBIDDEN_COLUMN_NAMES.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe Excel header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe name and try again.',
        });
      }
    }

    const columns = headers.filter((h): h is string => h !== undefined && h !== '');
    const rows: Row[] = [];

    sheet.eachRow({ includeEmpty: false }, (excelRow, rowNumber) => {
      if (rowNumber <= startRow) return;

      const row: Row = {};
      for (const column of columns) row[column] = null;

      let hasData = false;
      excelRow.eachCell({ includeEmpty: false }, (c, colNumber) => {
        const header = headers[colNumber - 1];
        if (!header) return;

        const value = normalizeExcelValue(c.value);
        if (value !== null && value !== '') hasData = true;
        row[header] = value;
      });

      if (hasData) {
        rows.push(row);
      }
    });

    return { columns, rows };
  }

  protected async serializeContent(table: Table): Promise<Buffer> {
    if (!this._workbook) {
      this._workbook = new ExcelJS.Workbook();
    }

    const existing = this.getSheet();
    const sheetName = existing?.name
      ?? (typeof this.config.sheet === 'string' ? this.config.sheet : 'Sheet1');
    if (existing) {
      this._workbook.removeWorksheet(existing.id);
    }
    fillWorksheet(this._workbook.addWorksheet(sheetName), table, {
      startRow: this.config.startRow,
      boldHeader: this.config.boldHeader,
      columnWidth: this.config.columnWidth,
    });

    const buffer = await this._workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }

  private getSheet(): ExcelJS.Worksheet | undefined {
    if (!this._workbook) return undefined;

    if (this.config.sheet !== undefined) {
      return this._workbook.getWorksheet(this.config.sheet);
    }

    return this._workbook.worksheets[0];
  }
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
