/**
 * Core Connector Interface
 *
 * Every data source (workbook, CSV, JSON cache file, database table)
 * is reached through this interface, so the importers and the cache
 * never depend on a concrete storage format.
 */

import type { Table, WriteResult } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (csv, excel, json, postgresql) */
  type: string;
  /** Reject write operations */
  readonly?: boolean;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface IConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  readonly config: TConfig;

  readonly state: ConnectionState;

  /**
   * Open the data source and load what is needed to serve reads
   * @throws ConnectorError if connection fails
   */
  connect(): Promise<void>;

  /**
   * Close the connection and release resources
   */
  disconnect(): Promise<void>;

  /**
   * Read every row. Column order follows the source.
   */
  readRows(): Promise<Table>;

  /**
   * Replace the whole content of the data source with `table`
   * @throws ConnectorError if the connector is read-only
   */
  replaceRows(table: Table): Promise<WriteResult>;

  /**
   * Check that the source is reachable without loading it
   */
  testConnection(): Promise<boolean>;
}
