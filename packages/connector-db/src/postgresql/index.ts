/**
 * PostgreSQL Connector
 *
 * Exports for PostgreSQL database integration.
 */

export { PostgresClient } from './client.js';
export type {
  PostgresClientConfig,
  PostgresColumn,
  PostgresInFilter,
  PostgresQueryResult,
} from './client.js';

export { PostgresConnector, createPostgresConnector, toClientConfig } from './connector.js';
export type { PostgresConnectorConfig } from './connector.js';

export { PostgresComponentDirectory } from './component-directory.js';
export type { PostgresComponentDirectoryConfig } from './component-directory.js';
