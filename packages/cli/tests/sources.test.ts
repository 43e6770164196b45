import { describe, expect, it } from 'vitest';
import { join, resolve } from 'node:path';
import { buildSourceConnectors, createCacheStoreFactory, parseConfig } from '../src/index.js';

const CONFIG = parseConfig(
  {
    paths: { dataDir: 'data', outputDir: 'out' },
    sources: {
      eterraExport: { type: 'excel', filePath: 'eterra.xlsx', tabs: { controls: 'CONTROLS' } },
      matchCompare: { type: 'csv', filePath: 'match.csv', delimiter: ';' },
      inventory: { type: 'json', filePath: '/shared/inventory.json' },
      alarmCompare: { type: 'excel', filePath: 'alarms.xlsx', sheet: 'Event Detail' },
      autoTests: { type: 'csv', filePath: 'autotests.csv' },
      commissioning: {
        type: 'postgresql',
        host: 'localhost',
        database: 'scada',
        password: 'test-secret',
        table: 'commissioning_log',
      },
    },
  },
  { env: {} }
);

describe('buildSourceConnectors', () => {
  const dataDir = resolve('/data');
  const sources = buildSourceConnectors(CONFIG, dataDir);

  it('opens the four eTerra tabs from one workbook', () => {
    expect(
      [sources.points, sources.analogs, sources.controls, sources.setpoints].map((connector) => connector.config)
    ).toEqual([
      expect.objectContaining({ type: 'excel', filePath: join(dataDir, 'eterra.xlsx'), sheet: 'POINT', readonly: true }),
      expect.objectContaining({ sheet: 'ANALOG' }),
      expect.objectContaining({ sheet: 'CONTROLS' }),
      expect.objectContaining({ sheet: 'SETPNT' }),
    ]);
  });

  it('resolves relative paths against the data directory', () => {
    expect(sources.matchCompare.config).toMatchObject({
      id: 'matchCompare',
      type: 'csv',
      filePath: join(dataDir, 'match.csv'),
      delimiter: ';',
    });
    expect(sources.inventory.config).toMatchObject({ type: 'json', filePath: resolve('/shared/inventory.json') });
    expect(sources.alarmCompare.config).toMatchObject({ type: 'excel', sheet: 'Event Detail' });
  });

  it('reads database sources through a read-only connector', () => {
    expect(sources.commissioning.config).toMatchObject({
      id: 'commissioning',
      type: 'postgresql',
      host: 'localhost',
      database: 'scada',
      table: 'commissioning_log',
      readonly: true,
    });
  });
});

describe('createCacheStoreFactory', () => {
  it('keeps one JSON file per cache key', () => {
    const store = createCacheStoreFactory('/cache')('rtu-AREC');

    expect(store.config).toMatchObject({
      id: 'cache-rtu-AREC',
      type: 'json',
      filePath: join('/cache', 'merged-rtu-AREC.json'),
      recordsPath: 'rows',
      columnsPath: 'columns',
      createIfMissing: true,
    });
  });
});
