import { describe, expect, it } from 'vitest';
import type { Row } from '@pointrec/core';
import {
  MergedViewCache,
  ReconciliationRun,
  formatRunSummary,
  parsePredicateLibrary,
  type RunResult,
  type SourceConnectors,
} from '../src/index.js';
import { MemoryConnector, memoryStores, rawPoint, recordingLogger, table } from './fixtures.js';

const PREDICATES = parsePredicateLibrary({
  predicates: [
    {
      id: 'Unconfigured',
      name: 'Not in the control system',
      and: [{ column: 'PowerOn Alias Exists', op: '==', value: false }],
    },
  ],
});

function empty(id: string, columns: string[]): MemoryConnector {
  return new MemoryConnector(id, { columns, rows: [] });
}

function inventoryRow(alias: string): Row {
  return {
    RTU: 'AREC_RTU',
    'RTU Address': '141',
    Protocol: 'MK2A',
    addr1: '109',
    addr2: '0',
    shift: 6,
    recordType: 'DD',
    comp_alias: alias,
  };
}

function sources(inventory: Row[] = []): SourceConnectors {
  return {
    points: new MemoryConnector('points', table([rawPoint()])),
    analogs: empty('analogs', [
      'eTerraKey',
      'sub',
      'devtyp',
      'device_id',
      'analog_id',
      'rtu',
      'rtu_address',
      'card',
      'word',
      'protocol',
    ]),
    controls: empty('controls', [
      'sub',
      'devtyp',
      'device_id',
      'point_id',
      'control_id',
      'rtu',
      'rtu_address',
      'card',
      'phyadr',
      'protocol',
    ]),
    setpoints: empty('setpoints', [
      'sub',
      'devtyp',
      'device_id',
      'analog_id',
      'rtu',
      'rtu_address',
      'card',
      'phyadr',
      'protocol',
    ]),
    matchCompare: empty('matchCompare', ['matched_status', 'GenericPointAddress']),
    inventory: new MemoryConnector('inventory', {
      columns: ['Protocol', 'RTU', 'RTU Address', 'addr1', 'addr2', 'shift', 'recordType', 'comp_alias'],
      rows: inventory,
    }),
    alarmCompare: empty('alarmCompare', ['eTerra Alias', 'Value']),
    autoTests: empty('autoTests', ['RTU', 'control_address']),
    commissioning: empty('commissioning', ['RTUname', 'control_address', 'test_name', 'result']),
  };
}

describe('ReconciliationRun', () => {
  it('builds the merged table, caches it and evaluates the predicates', async () => {
    const { stores, open } = memoryStores();
    const observed: string[] = [];
    const run = new ReconciliationRun({
      sources: sources(),
      predicates: PREDICATES,
      cache: new MergedViewCache(open),
      onTable: async (name) => {
        observed.push(name);
      },
    });

    const result = await run.execute({ kind: 'all' });

    expect(result.fromCache).toBe(false);
    expect(result.summary).toEqual([{ id: 'Unconfigured', name: 'Not in the control system', count: 1 }]);
    expect(result.table.rows.map((row) => [row.eTerraAlias, row.Unconfigured])).toEqual([
      ['ARE/CB/CB1/SWDD', true],
    ]);
    expect(observed).toEqual([
      'points',
      'analogs',
      'controls',
      'setpoints',
      'matchCompare',
      'inventory',
      'alarmCompare',
      'rtuMap',
      'autoTests',
      'commissioning',
      'merged-all',
    ]);
    expect(stores.get('all')?.stored?.rows).toHaveLength(1);
    expect(stores.get('all')?.stored?.columns).not.toContain('Unconfigured');
  });

  it('skips the sources when the cache holds the scope', async () => {
    const { open } = memoryStores();
    const cache = new MergedViewCache(open);
    await new ReconciliationRun({ sources: sources(), predicates: PREDICATES, cache }).execute({ kind: 'all' });

    const second = sources();
    const result = await new ReconciliationRun({ sources: second, predicates: PREDICATES, cache }).execute({
      kind: 'rtu',
      name: 'AREC',
    });

    expect(result.fromCache).toBe(true);
    expect(result.table.rows).toHaveLength(1);
    expect(second.points instanceof MemoryConnector ? second.points.reads : -1).toBe(0);
  });

  it('rebuilds when asked to refresh the cache', async () => {
    const { open } = memoryStores();
    const cache = new MergedViewCache(open);
    await new ReconciliationRun({ sources: sources(), predicates: PREDICATES, cache }).execute({ kind: 'all' });

    const result = await new ReconciliationRun({
      sources: sources(),
      predicates: PREDICATES,
      cache,
      refreshCache: true,
    }).execute({ kind: 'all' });

    expect(result.fromCache).toBe(false);
  });

  it('stops on duplicate inventory addresses unless they are allowed', async () => {
    const duplicated = [inventoryRow('C-1'), inventoryRow('C-2')];

    await expect(
      new ReconciliationRun({ sources: sources(duplicated), predicates: PREDICATES }).execute({ kind: 'all' })
    ).rejects.toMatchObject({ code: 'DUPLICATE_ADDRESS' });

    const logger = recordingLogger();
    const result = await new ReconciliationRun({
      sources: sources(duplicated),
      predicates: PREDICATES,
      allowDuplicateAddresses: true,
      logger,
    }).execute({ kind: 'all' });

    expect(result.table.rows[0]).toMatchObject({ POAlias: 'C-2', 'PowerOn Alias Exists': true });
    expect(result.summary[0]?.count).toBe(0);
    expect(logger.warnings).toEqual(['Keeping the last of 2 inventory rows for [(AREC:141):109:4- DD]']);
  });
});

describe('formatRunSummary', () => {
  it('lists every predicate with its count', () => {
    const result: RunResult = {
      id: 'run-1',
      startedAt: new Date('2024-05-01T08:00:00.000Z'),
      scope: { kind: 'rtu', name: 'AREC' },
      fromCache: true,
      table: table([{ A: 1 }, { A: 2 }]),
      summary: [
        { id: 'Report1', name: 'Missing Analog Components', count: 3 },
        { id: 'ReportANY', name: 'Any Defect', count: 12 },
      ],
      processingTimeMs: 12,
    };

    expect(formatRunSummary(result).split('\n')).toEqual([
      '## Defect Summary',
      'Scope: rtu-AREC',
      'Started: 2024-05-01T08:00:00.000Z',
      'Rows: 2 (from cache)',
      '',
      '- Report1     3  Missing Analog Components',
      '- ReportANY  12  Any Defect',
      '',
      '---',
      'Processing time: 12ms',
    ]);
  });
});
