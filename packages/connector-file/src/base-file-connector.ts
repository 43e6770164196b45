/**
 * Base class for file-based connectors
 * Loads the whole file on connect and serves reads from memory
 */

import { readFile, writeFile, access, mkdir } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';
import type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  WriteResult,
  Row,
  Table,
} from '@pointrec/core';
import { ConnectorError, systemErrorCode } from '@pointrec/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /** Start with an empty table when the file does not exist yet */
  createIfMissing?: boolean;
}

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements IConnector<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _columns: string[] = [];
  protected _rows: Row[] = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      if (this.config.createIfMissing && !(await this.testConnection())) {
        this._columns = [];
        this._rows = [];
        this._state = 'connected';
        return;
      }

      await access(this.config.filePath, constants.R_OK);

      const content = await readFile(this.config.filePath);
      const table = await this.parseContent(content);
      this._columns = table.columns;
      this._rows = table.rows;
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      const code = systemErrorCode(error);
      if (code === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._columns = [];
    this._rows = [];
    this._state = 'disconnected';
  }

  async readRows(): Promise<Table> {
    this.ensureConnected();
    return {
      columns: [...this._columns],
      rows: this._rows.map((row) => ({ ...row })),
    };
  }

  async replaceRows(table: Table): Promise<WriteResult> {
    this.ensureConnected();

    if (this.config.readonly) {
      throw new ConnectorError({
        code: 'UNSUPPORTED_OPERATION',
        message: 'This connector is configured as read-only',
        connectorId: this.config.id,
        suggestion: 'Create a new connector with readonly: false to enable writes.',
      });
    }

    try {
      const content = await this.serializeContent(table);
      await mkdir(dirname(this.config.filePath), { recursive: true });
      await writeFile(this.config.filePath, content, this.config.encoding ?? 'utf-8');

      this._columns = [...table.columns];
      this._rows = table.rows.map((row) => ({ ...row }));

      return {
        success: table.rows.length,
        failed: 0,
      };
    } catch (error) {
      if (error instanceof ConnectorError) {
        throw error;
      }
      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Failed to write rows: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }

  protected get encoding(): BufferEncoding {
    return this.config.encoding ?? 'utf-8';
  }

  /**
   * Parse file content into a table (implemented by subclasses)
   */
  protected abstract parseContent(content: Buffer): Promise<Table>;

  /**
   * Serialize a table back to file content (implemented by subclasses)
   */
  protected abstract serializeContent(table: Table): Promise<string | Buffer>;
}
