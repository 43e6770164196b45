import { describe, expect, it, vi } from 'vitest';
import { ConnectorError } from '@pointrec/core';

vi.mock('pg', () => {
  class UnreachablePool {
    connect = vi.fn(async () => {
      throw new Error('timeout expired');
    });
    query = vi.fn();
    end = vi.fn(async () => {});
  }
  return { default: { Pool: UnreachablePool }, Pool: UnreachablePool };
});

import { createPostgresConnector } from '../src/postgresql/connector.js';
import { PostgresComponentDirectory } from '../src/postgresql/component-directory.js';

describe('Database connection failures', () => {
  it('reports an unreachable test log with the connector id', async () => {
    const connector = createPostgresConnector({
      id: 'commissioning',
      name: 'commissioning log',
      host: 'localhost',
      table: 'commissioning_log',
    });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      connectorId: 'commissioning',
      message: 'PostgreSQL connection failed: timeout expired',
    });
    expect(connector.state).toBe('error');
    expect(await connector.testConnection()).toBe(false);
  });

  it('reports an unreachable component directory', async () => {
    const directory = new PostgresComponentDirectory({ host: 'localhost', password: 'test-secret' });

    const error = await directory.connect().then(
      () => undefined,
      (caught: unknown) => caught
    );
    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ code: 'CONNECTION_FAILED', suggestion: 'Check host, port, database, user, and password.' });
  });
});
