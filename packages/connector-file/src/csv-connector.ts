/**
 * CSV Connector
 * Reads CSV exports as text cells and writes debug dumps
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { CellValue, Row, Table } from '@pointrec/core';
import { ConnectorError, cell } from '@pointrec/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
  /** Read empty cells as null instead of '' (default: true) */
  emptyAsNull?: boolean;
  /**
   * Mitigate CSV/Excel formula injection on write by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

const FORBIDDEN_COLUMN_NAMES = new Set(['__proto__', 'prototype', 'constructor']);

function sanitizeFormulaValue(value: CellValue, prefix: string): CellValue {
  if (typeof value !== 'string') return value;
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: Buffer): Promise<Table> {
    const records: string[][] = parse(content, {
      bom: true,
      encoding: this.encoding,
      columns: false,
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      skip_empty_lines: this.config.skipEmptyLines !== false,
      relax_column_count: true,
      trim: true,
    });

    const [headerRow, ...dataRows] = records;
    if (!headerRow) return { columns: [], rows: [] };

    const columns = headerRow.map((h) => String(h ?? ''));
    for (const column of columns) {
      if (FORBIDDEN_COLUMN_NAMES.has(column)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe CSV header name: ${column}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe name and try again.',
        });
      }
    }

    const emptyAsNull = this.config.emptyAsNull !== false;
    const rows = dataRows.map((record) => {
      const row: Row = {};
      columns.forEach((column, i) => {
        const raw = record[i];
        row[column] = raw === undefined || (emptyAsNull && raw === '') ? null : raw;
      });
      return row;
    });

    return { columns, rows };
  }

  protected async serializeContent(table: Table): Promise<string> {
    if (table.columns.length === 0) {
      return '';
    }

    const sanitize = this.config.sanitizeFormulas !== false;
    const prefix = this.config.formulaEscapePrefix ?? "'";

    const records = table.rows.map((row) =>
      table.columns.map((column) => {
        const value = cell(row, column);
        return sanitize ? sanitizeFormulaValue(value, prefix) : value;
      })
    );

    return stringify([table.columns, ...records], {
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      cast: {
        boolean: (value: boolean) => (value ? 'True' : 'False'),
      },
    });
  }
}

/**
 * Factory function to create a CSV connector
 */
export function createCsvConnector(
  config: Omit<CsvConnectorConfig, 'type'>
): CsvConnector {
  return new CsvConnector(config);
}
