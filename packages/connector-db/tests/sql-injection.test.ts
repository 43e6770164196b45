import { describe, expect, it, vi, beforeEach } from 'vitest';
import { ConnectorError } from '@pointrec/core';

const pgQueries: { sql: string; params?: unknown[] }[] = [];
let aliasRows: { component_alias: string }[] = [];

vi.mock('pg', () => {
  class MockClient {
    release = vi.fn();
  }
  class MockPool {
    connect = vi.fn(async () => new MockClient());
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      if (sql.includes('information_schema.columns')) {
        const table = params?.[1];
        const rows = table === 'component_header'
          ? [{ name: 'component_alias', data_type: 'text' }]
          : [
              { name: 'RTUname', data_type: 'text' },
              { name: 'control_address', data_type: 'text' },
              { name: 'test_date', data_type: 'timestamp without time zone' },
            ];
        return { rows, rowCount: rows.length };
      }
      pgQueries.push({ sql, params });
      if (sql.includes('component_header')) {
        const wanted = new Set(params);
        const rows = aliasRows.filter((r) => wanted.has(r.component_alias));
        return { rows, rowCount: rows.length };
      }
      return {
        rows: [{ RTUname: 'AREC_RTU', control_address: '252:6:1', test_date: new Date('2024-05-01T08:00:00.000Z') }],
        rowCount: 1,
      };
    });
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

// Imports after mocks
import { PostgresClient } from '../src/postgresql/client.js';
import { createPostgresConnector } from '../src/postgresql/connector.js';
import { PostgresComponentDirectory } from '../src/postgresql/component-directory.js';

describe('SQL identifier validation', () => {
  beforeEach(() => {
    pgQueries.length = 0;
    aliasRows = [];
  });

  it('rejects malicious column names', async () => {
    const client = new PostgresClient({});
    await expect(
      client.select('test_results', {
        whereIn: { column: 'RTUname;DROP TABLE users;', values: [1] },
      })
    ).rejects.toBeInstanceOf(ConnectorError);
    expect(pgQueries).toHaveLength(0);
  });

  it('rejects malicious table names', async () => {
    const client = new PostgresClient({});
    await expect(client.select('test_results"; --')).rejects.toMatchObject({ code: 'READ_FAILED' });
    expect(pgQueries).toHaveLength(0);
  });

  it('parameterizes the IN list', async () => {
    const client = new PostgresClient({});
    await client.select('test_results', {
      columns: ['RTUname', 'control_address'],
      whereIn: { column: 'RTUname', values: ['AREC_RTU', 'ANDE3_RTU'] },
    });

    expect(pgQueries[0]).toEqual({
      sql: 'SELECT "RTUname", "control_address" FROM "public"."test_results" WHERE "RTUname" IN ($1, $2)',
      params: ['AREC_RTU', 'ANDE3_RTU'],
    });
  });

  it('selects nothing for an empty IN list', async () => {
    const client = new PostgresClient({});
    expect(await client.select('test_results', { whereIn: { column: 'RTUname', values: [] } })).toEqual([]);
    expect(pgQueries).toHaveLength(0);
  });
});

describe('PostgresConnector', () => {
  beforeEach(() => {
    pgQueries.length = 0;
  });

  it('reads rows as cells in table column order', async () => {
    const connector = createPostgresConnector({
      id: 'commissioning',
      name: 'commissioning',
      table: 'test_results',
      password: 'test-secret',
    });

    await connector.connect();
    const result = await connector.readRows();

    expect(result.columns).toEqual(['RTUname', 'control_address', 'test_date']);
    expect(result.rows).toEqual([
      { RTUname: 'AREC_RTU', control_address: '252:6:1', test_date: '2024-05-01T08:00:00.000Z' },
    ]);
    await connector.disconnect();
  });

  it('is read-only', async () => {
    const connector = createPostgresConnector({ id: 'pg', name: 'pg', table: 'test_results' });
    await connector.connect();
    expect(connector.config.readonly).toBe(true);
    await expect(connector.replaceRows()).rejects.toMatchObject({ code: 'UNSUPPORTED_OPERATION' });
  });

  it('requires connect() before reads', async () => {
    const connector = createPostgresConnector({ id: 'pg', name: 'pg', table: 'test_results' });
    await expect(connector.readRows()).rejects.toMatchObject({ code: 'CONNECTION_FAILED' });
  });
});

describe('PostgresComponentDirectory', () => {
  beforeEach(() => {
    pgQueries.length = 0;
  });

  it('looks aliases up in batches', async () => {
    aliasRows = [{ component_alias: 'AREC/RTU/CB1/TCP' }, { component_alias: 'ANDE3/RTU/CB2/A' }];
    const directory = new PostgresComponentDirectory({ batchSize: 2 });

    const found = await directory.findExistingAliases([
      'AREC/RTU/CB1/TCP',
      'AREC/RTU/CB1/X',
      'ANDE3/RTU/CB2/A',
      'AREC/RTU/CB1/TCP',
    ]);

    expect(Array.from(found).sort()).toEqual(['ANDE3/RTU/CB2/A', 'AREC/RTU/CB1/TCP']);
    expect(pgQueries).toHaveLength(2);
    expect(pgQueries[0]?.sql).toBe(
      'SELECT "component_alias" FROM "public"."component_header" WHERE "component_alias" IN ($1, $2)'
    );
    expect(pgQueries[1]?.params).toEqual(['ANDE3/RTU/CB2/A']);
  });

  it('issues no query for an empty list', async () => {
    const directory = new PostgresComponentDirectory({});
    expect((await directory.findExistingAliases([])).size).toBe(0);
    expect(pgQueries).toHaveLength(0);
  });
});
