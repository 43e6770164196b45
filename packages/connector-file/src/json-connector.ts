/**
 * JSON Connector
 * Reads and writes JSON files holding arrays of flat row objects
 */

import type { Row, Table } from '@pointrec/core';
import { ConnectorError, cell, columnsSchema, extractColumnNames, rowsSchema, unionColumns } from '@pointrec/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface JsonConnectorConfig extends FileConnectorConfig {
  type: 'json';
  /** Dot path to the rows array (e.g., 'data.items') */
  recordsPath?: string;
  /**
   * Dot path to the column list. Keeps the column order, and the columns of
   * an empty table, across a write and a read. Needs `recordsPath`.
   */
  columnsPath?: string;
  /** Pretty print output (default: true) */
  prettyPrint?: boolean;
  /** Indentation spaces (default: 2) */
  indent?: number;
}

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function parseSafePath(path: string, connectorId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      connectorId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        connectorId,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath.',
      });
    }
  }

  return parts;
}

function getNestedValue(obj: unknown, path: string, connectorId: string): unknown {
  let current = obj;

  for (const part of parseSafePath(path, connectorId)) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }

  return current;
}

function setNestedValue(
  root: { [key: string]: unknown },
  path: string,
  value: unknown,
  connectorId: string
): void {
  const parts = parseSafePath(path, connectorId);
  const last = parts.pop() ?? path;
  let current = root;

  for (const part of parts) {
    const next: unknown = Object.prototype.hasOwnProperty.call(current, part)
      ? current[part]
      : undefined;
    const child: { [key: string]: unknown } =
      next !== null && typeof next === 'object' && !Array.isArray(next) ? { ...next } : {};
    current[part] = child;
    current = child;
  }

  current[last] = value;
}

export class JsonConnector extends BaseFileConnector<JsonConnectorConfig> {
  private _originalStructure: unknown = null;

  constructor(config: Omit<JsonConnectorConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
    if (config.columnsPath && !config.recordsPath) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: 'columnsPath needs recordsPath',
        connectorId: config.id,
        suggestion: 'Set recordsPath so rows and columns are stored in one object.',
      });
    }
  }

  protected async parseContent(content: Buffer): Promise<Table> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content.toString(this.encoding));
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
    this._originalStructure = parsed;

    const candidate = this.config.recordsPath
      ? getNestedValue(parsed, this.config.recordsPath, this.config.id)
      : parsed;

    const result = rowsSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: this.config.recordsPath
          ? `Path '${this.config.recordsPath}' does not contain an array of flat rows`
          : 'JSON file does not contain an array of flat rows at root level',
        connectorId: this.config.id,
        suggestion: 'Provide an array of objects whose values are strings, numbers, booleans or null.',
        context: { issues: result.error.issues.slice(0, 5) },
      });
    }

    const rows: Row[] = result.data;
    return { columns: unionColumns(this.storedColumns(parsed), extractColumnNames(rows)), rows };
  }

  private storedColumns(parsed: unknown): string[] {
    const { columnsPath } = this.config;
    if (!columnsPath) return [];

    const result = columnsSchema.safeParse(getNestedValue(parsed, columnsPath, this.config.id));
    if (!result.success) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Path '${columnsPath}' does not contain a list of column names`,
        connectorId: this.config.id,
      });
    }
    return result.data;
  }

  protected async serializeContent(table: Table): Promise<string> {
    const indent = this.config.prettyPrint !== false ? (this.config.indent ?? 2) : 0;
    const rows = table.rows.map((row) => {
      const out: Row = {};
      for (const column of table.columns) {
        out[column] = cell(row, column);
      }
      return out;
    });

    const original = this._originalStructure;
    if (this.config.recordsPath) {
      const output: { [key: string]: unknown } =
        original !== null && typeof original === 'object' && !Array.isArray(original)
          ? { ...original }
          : {};
      setNestedValue(output, this.config.recordsPath, rows, this.config.id);
      if (this.config.columnsPath) {
        setNestedValue(output, this.config.columnsPath, [...table.columns], this.config.id);
      }
      return JSON.stringify(output, null, indent);
    }

    return JSON.stringify(rows, null, indent);
  }
}

/**
 * Factory function to create a JSON connector
 */
export function createJsonConnector(
  config: Omit<JsonConnectorConfig, 'type'>
): JsonConnector {
  return new JsonConnector(config);
}
