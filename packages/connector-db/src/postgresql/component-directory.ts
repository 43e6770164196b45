/**
 * Component alias lookup against the target system's component table
 */

import type { ComponentDirectory } from '@pointrec/core';
import { PostgresClient, type PostgresClientConfig } from './client.js';

export interface PostgresComponentDirectoryConfig extends PostgresClientConfig {
  /** Table holding one row per component (default: component_header) */
  table?: string;
  /** Column holding the alias (default: component_alias) */
  aliasColumn?: string;
  schema?: string;
  /** Aliases per query (default: 1000) */
  batchSize?: number;
}

export class PostgresComponentDirectory implements ComponentDirectory {
  private readonly client: PostgresClient;
  private readonly table: string;
  private readonly aliasColumn: string;
  private readonly batchSize: number;

  constructor(private readonly config: PostgresComponentDirectoryConfig) {
    this.client = new PostgresClient(config);
    this.table = config.table ?? 'component_header';
    this.aliasColumn = config.aliasColumn ?? 'component_alias';
    this.batchSize = Math.max(1, config.batchSize ?? 1000);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  async findExistingAliases(aliases: string[]): Promise<Set<string>> {
    const unique = Array.from(new Set(aliases));
    const found = new Set<string>();

    for (let i = 0; i < unique.length; i += this.batchSize) {
      const batch = unique.slice(i, i + this.batchSize);
      const rows = await this.client.select(this.table, {
        columns: [this.aliasColumn],
        whereIn: { column: this.aliasColumn, values: batch },
        schema: this.config.schema,
      });
      for (const row of rows) {
        const alias: unknown = row[this.aliasColumn];
        if (typeof alias === 'string') found.add(alias);
      }
    }

    return found;
  }
}
