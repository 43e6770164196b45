/**
 * PostgreSQL Client
 *
 * Read-only wrapper around a pg pool. Table, schema and column names are
 * validated against the catalog before they are interpolated into SQL.
 */

import pg from 'pg';
import { ConnectorError } from '@pointrec/core';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Milliseconds to wait for a pooled connection */
  connectTimeoutMs?: number;
}

export interface PostgresColumn {
  name: string;
  dataType: string;
}

/** `column IN (values)` */
export interface PostgresInFilter {
  column: string;
  values: unknown[];
}

export interface PostgresQueryResult<T> {
  rows: T[];
  rowCount: number;
}

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function validateIdentifier(name: string, type: string): void {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
    });
  }
}

function validateColumns(columns: string[], allowedColumns: Set<string>, context: string): void {
  for (const col of columns) {
    if (!allowedColumns.has(col)) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Invalid column "${col}" in ${context}. Column does not exist in table schema.`,
        suggestion: `Valid columns: ${Array.from(allowedColumns).join(', ')}`,
      });
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PostgresClient {
  private pool: pg.Pool;
  private columnCache = new Map<string, PostgresColumn[]>();

  constructor(config: PostgresClientConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 4,
      connectionTimeoutMillis: config.connectTimeoutMs ?? 10_000,
    });
  }

  /**
   * Check out and release one connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL connection failed: ${errorMessage(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.columnCache.clear();
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    sql: string,
    params?: unknown[]
  ): Promise<PostgresQueryResult<T>> {
    try {
      const result = await this.pool.query<T>(sql, params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    } catch (error) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Columns of a table in ordinal order (cached per table)
   */
  async getColumns(table: string, schema = 'public'): Promise<PostgresColumn[]> {
    validateIdentifier(schema, 'schema');
    validateIdentifier(table, 'table');

    const cacheKey = `${schema}.${table}`;
    const cached = this.columnCache.get(cacheKey);
    if (cached) return cached;

    const sql = `
      SELECT c.column_name AS name, c.data_type AS data_type
      FROM information_schema.columns c
      WHERE c.table_schema = $1 AND c.table_name = $2
      ORDER BY c.ordinal_position
    `;

    const result = await this.query<{ name: string; data_type: string }>(sql, [schema, table]);
    if (result.rows.length === 0) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Table not found: ${schema}.${table}`,
        suggestion: 'Check the table and schema names in the configuration.',
      });
    }

    const columns = result.rows.map((row) => ({ name: row.name, dataType: row.data_type }));
    this.columnCache.set(cacheKey, columns);
    return columns;
  }

  /**
   * Select rows, optionally restricted to a set of values in one column
   */
  async select(
    table: string,
    options: {
      columns?: string[];
      whereIn?: PostgresInFilter;
      schema?: string;
    } = {}
  ): Promise<pg.QueryResultRow[]> {
    const schema = options.schema ?? 'public';
    const allowedColumns = new Set((await this.getColumns(table, schema)).map((c) => c.name));

    if (options.columns?.length) {
      validateColumns(options.columns, allowedColumns, 'SELECT');
    }

    const params: unknown[] = [];
    const columnList = options.columns?.length
      ? options.columns.map((c) => `"${c}"`).join(', ')
      : '*';

    let sql = `SELECT ${columnList} FROM "${schema}"."${table}"`;

    const filter = options.whereIn;
    if (filter) {
      validateColumns([filter.column], allowedColumns, 'WHERE');
      if (filter.values.length === 0) return [];
      const placeholders = filter.values.map((value) => {
        params.push(value);
        return `$${params.length}`;
      });
      sql += ` WHERE "${filter.column}" IN (${placeholders.join(', ')})`;
    }

    const result = await this.query(sql, params);
    return result.rows;
  }
}
