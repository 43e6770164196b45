/**
 * Turns config entries into connectors
 */

import { join, resolve } from 'node:path';
import type { IConnector } from '@pointrec/core';
import { createCsvConnector, createExcelConnector, createJsonConnector } from '@pointrec/connector-file';
import { PostgresComponentDirectory, createPostgresConnector, toClientConfig } from '@pointrec/connector-db';
import type { CacheStoreFactory, SourceConnectors } from '@pointrec/recon-core';
import type { ConfigFile, SourceEntry, TargetSystemConfig } from './config.js';

export function createSourceConnector(id: string, entry: SourceEntry, dataDir: string): IConnector {
  switch (entry.type) {
    case 'csv':
      return createCsvConnector({
        id,
        name: id,
        filePath: resolve(dataDir, entry.filePath),
        encoding: entry.encoding,
        delimiter: entry.delimiter,
        quote: entry.quote,
        readonly: true,
      });
    case 'excel':
      return createExcelConnector({
        id,
        name: id,
        filePath: resolve(dataDir, entry.filePath),
        sheet: entry.sheet,
        startRow: entry.startRow,
        readonly: true,
      });
    case 'json':
      return createJsonConnector({
        id,
        name: id,
        filePath: resolve(dataDir, entry.filePath),
        encoding: entry.encoding,
        recordsPath: entry.recordsPath,
        readonly: true,
      });
    case 'postgresql':
      return createPostgresConnector({
        id,
        name: id,
        ...toClientConfig(entry),
        table: entry.table,
        schema: entry.schema,
      });
    default: {
      const exhaustive: never = entry;
      throw new Error(`Unsupported source type: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * One connector per extract; the four eTerra tabs share a workbook
 */
export function buildSourceConnectors(config: ConfigFile, dataDir: string): SourceConnectors {
  const { eterraExport, ...others } = config.sources;
  const workbook = resolve(dataDir, eterraExport.filePath);
  const tab = (id: string, sheet: string): IConnector =>
    createExcelConnector({ id, name: `${id} (${sheet})`, filePath: workbook, sheet, readonly: true });

  return {
    points: tab('points', eterraExport.tabs.points),
    analogs: tab('analogs', eterraExport.tabs.analogs),
    controls: tab('controls', eterraExport.tabs.controls),
    setpoints: tab('setpoints', eterraExport.tabs.setpoints),
    matchCompare: createSourceConnector('matchCompare', others.matchCompare, dataDir),
    inventory: createSourceConnector('inventory', others.inventory, dataDir),
    alarmCompare: createSourceConnector('alarmCompare', others.alarmCompare, dataDir),
    autoTests: createSourceConnector('autoTests', others.autoTests, dataDir),
    commissioning: createSourceConnector('commissioning', others.commissioning, dataDir),
  };
}

/** `<cacheDir>/merged-<key>.json` per cache key, holding `{ rows, columns }` */
export function createCacheStoreFactory(cacheDir: string): CacheStoreFactory {
  return (key) =>
    createJsonConnector({
      id: `cache-${key}`,
      name: `cache ${key}`,
      filePath: join(cacheDir, `merged-${key}.json`),
      recordsPath: 'rows',
      columnsPath: 'columns',
      createIfMissing: true,
      prettyPrint: false,
    });
}

export function createComponentDirectory(target: TargetSystemConfig): PostgresComponentDirectory {
  return new PostgresComponentDirectory({
    ...toClientConfig(target),
    table: target.table,
    aliasColumn: target.aliasColumn,
    schema: target.schema,
    batchSize: target.batchSize,
  });
}
