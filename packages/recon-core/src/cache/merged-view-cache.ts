/**
 * Merged View Cache
 *
 * Keeps the merged table per scope so a later run can skip the import and
 * merge stages. A scoped lookup falls back to the `all` entry and filters
 * it in memory.
 */

import type { IConnector, Table } from '@pointrec/core';
import { ReconError } from '../errors/index.js';
import { readTable, writeTable } from '../io/index.js';
import { applyScope } from '../merge/index.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { scopeKey, type ReconScope } from '../types/scope.js';

/**
 * Opens the store behind one cache key. The store must accept a write when
 * it does not exist yet.
 */
export type CacheStoreFactory = (key: string) => IConnector;

export interface CacheHit {
  table: Table;
  /** Key the table was read from */
  key: string;
}

export interface MergedViewCacheOptions {
  logger?: ReconLogger;
}

export class MergedViewCache {
  private readonly logger: ReconLogger;

  constructor(
    private readonly openStore: CacheStoreFactory,
    options: MergedViewCacheOptions = {}
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Cached table for `scope`, or null on a miss
   */
  async read(scope: ReconScope): Promise<CacheHit | null> {
    const exact = scopeKey(scope);
    const keys = scope.kind === 'all' ? [exact] : [exact, 'all'];

    for (const key of keys) {
      const store = this.openStore(key);
      const available = await this.guard(key, 'check', () => store.testConnection());
      if (!available) {
        this.logger.debug(`Cache miss for ${key}`);
        continue;
      }

      const stored = await this.guard(key, 'read', () => readTable(store));
      if (stored.columns.length === 0) {
        this.logger.warn(`Cache ${key} holds no columns; rebuilding`, { key });
        continue;
      }
      const table = key === exact ? stored : applyScope(stored, scope);
      this.logger.info(`Read ${table.rows.length} rows from cache ${key}`, { key, scope: exact });
      return { table, key };
    }
    return null;
  }

  async write(scope: ReconScope, table: Table): Promise<void> {
    const key = scopeKey(scope);
    const written = await this.guard(key, 'write', () => writeTable(this.openStore(key), table));
    this.logger.info(`Wrote ${written} rows to cache ${key}`, { key });
  }

  private async guard<T>(key: string, action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new ReconError({
        code: 'CACHE_ERROR',
        message: `Failed to ${action} cache ${key}: ${error instanceof Error ? error.message : String(error)}`,
        suggestion: 'Run again with --refresh-cache, or delete the cache file.',
        cause: error instanceof Error ? error : undefined,
        context: { key },
      });
    }
  }
}
