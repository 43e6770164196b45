/**
 * PostgreSQL Connector
 *
 * Read-only IConnector over one table (e.g. the commissioning test log).
 */

import type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  Row,
  Table,
  WriteResult,
} from '@pointrec/core';
import { ConnectorError, toCellValue } from '@pointrec/core';
import { PostgresClient, type PostgresClientConfig } from './client.js';

export interface PostgresConnectorConfig extends ConnectorConfig {
  type: 'postgresql';
  /** Connection string (alternative to individual params) */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Table to read */
  table: string;
  /** Schema (default: public) */
  schema?: string;
  /** Milliseconds to wait for a connection */
  connectTimeoutMs?: number;
}

export function toClientConfig(config: Omit<PostgresConnectorConfig, 'type' | 'id' | 'name' | 'table'>): PostgresClientConfig {
  return {
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    connectTimeoutMs: config.connectTimeoutMs,
  };
}

export class PostgresConnector implements IConnector<PostgresConnectorConfig> {
  readonly config: PostgresConnectorConfig;
  private _state: ConnectionState = 'disconnected';
  private _client: PostgresClient | null = null;

  constructor(config: Omit<PostgresConnectorConfig, 'type'> & { type?: 'postgresql' }) {
    this.config = { ...config, type: 'postgresql', readonly: true };
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      this._client = new PostgresClient(toClientConfig(this.config));
      await this._client.connect();

      this._state = 'connected';
    } catch (error) {
      this._state = 'error';
      this._client = null;

      if (error instanceof ConnectorError) {
        throw new ConnectorError({
          code: error.code,
          message: error.message,
          connectorId: this.config.id,
          suggestion: error.suggestion,
          cause: error,
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to PostgreSQL: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        suggestion: 'Check connection parameters and network connectivity.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    if (this._client) {
      await this._client.disconnect();
    }
    this._client = null;
    this._state = 'disconnected';
  }

  async readRows(): Promise<Table> {
    const client = this.ensureConnected();

    const [tableColumns, records] = await Promise.all([
      client.getColumns(this.config.table, this.config.schema),
      client.select(this.config.table, { schema: this.config.schema }),
    ]);

    const columns = tableColumns.map((c) => c.name);
    const rows = records.map((record) => {
      const row: Row = {};
      for (const column of columns) {
        row[column] = toCellValue(record[column]);
      }
      return row;
    });

    return { columns, rows };
  }

  async replaceRows(): Promise<WriteResult> {
    throw new ConnectorError({
      code: 'UNSUPPORTED_OPERATION',
      message: `PostgreSQL table ${this.config.table} is read-only`,
      connectorId: this.config.id,
      suggestion: 'Use a file connector for output tables.',
    });
  }

  async testConnection(): Promise<boolean> {
    if (!this._client) return false;
    try {
      await this._client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private ensureConnected(): PostgresClient {
    if (this._state !== 'connected' || !this._client) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
    return this._client;
  }
}

/**
 * Factory function to create a PostgreSQL connector
 */
export function createPostgresConnector(
  config: Omit<PostgresConnectorConfig, 'type'>
): PostgresConnector {
  return new PostgresConnector(config);
}
