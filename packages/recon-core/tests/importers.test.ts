import { describe, expect, it } from 'vitest';
import type { Row } from '@pointrec/core';
import {
  ReconError,
  RtuMap,
  cleanAnalogExport,
  cleanAutoTests,
  cleanControlExport,
  cleanInventory,
  cleanMatchCompare,
  cleanPointExport,
  cleanSetpointExport,
  genericTypeFromPoType,
} from '../src/index.js';
import { rawPoint, recordingLogger, table } from './fixtures.js';

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

function rawInventory(overrides: Row = {}): Row {
  return {
    RTU: 'AREC_RTU',
    'RTU Address': '141',
    Protocol: 'MK2A',
    addr1: '109',
    addr2: '0',
    shift: 3,
    recordType: 'DI',
    comp_alias: 'C-1',
    config_health: 'GOOD',
    control_val: null,
    size: '1',
    eterra_sub: 'ARE',
    eterra_dev_type: 'CB',
    eterra_dev_id: 'CB1',
    eterra_point_id: 'SWDD',
    symbol_name: 'lamp',
    telecontrol_action: null,
    ...overrides,
  };
}

describe('eTerra export cleaners', () => {
  it('renames POINT columns and derives the identity of each point', () => {
    const cleaned = cleanPointExport(table([rawPoint()]));

    expect(cleaned.columns).toEqual([
      'eTerraKey',
      'eTerraAlias',
      'Sub',
      'DeviceType',
      'DeviceId',
      'DeviceName',
      'PointId',
      'PointName',
      'RTU',
      'RTUAddress',
      'Card',
      'Word',
      'CASDU',
      'IOA',
      'IOA1',
      'IOA2',
      'Size',
      'Protocol',
      'Controllable',
      'RTUId',
      'GenericPointAddress',
      'GenericType',
    ]);
    expect(cleaned.rows).toEqual([
      {
        eTerraKey: 'K1',
        eTerraAlias: 'ARE/CB/CB1/SWDD',
        Sub: 'ARE',
        DeviceType: 'CB',
        DeviceId: 'CB1',
        DeviceName: 'Breaker 1',
        PointId: 'SWDD',
        PointName: 'CB1 status',
        RTU: 'AREC',
        RTUAddress: '141',
        Card: '109',
        Word: '4',
        CASDU: null,
        IOA: null,
        IOA1: null,
        IOA2: null,
        Size: 2,
        Protocol: 'MK2A',
        Controllable: '1',
        RTUId: '(AREC:141)',
        GenericPointAddress: '[(AREC:141):109:4- DD]',
        GenericType: 'DD',
      },
    ]);
  });

  it('drops spurious rows and marks points without card or CASDU as DUMMY', () => {
    const logger = recordingLogger();
    const cleaned = cleanPointExport(
      table([
        rawPoint({ device_id: 'SPURIOUS', point_id: 'X' }),
        rawPoint({ point_name: 'SPURIOUS ALARM 3' }),
        rawPoint({ card: null, point_id: 'SWSD', concat_conect: '0' }),
      ]),
      { logger }
    );

    expect(cleaned.rows.map((row) => [row.eTerraAlias, row.GenericType, row.Size])).toEqual([
      ['ARE/CB/CB1/SWSD', 'DUMMY', 1],
    ]);
    expect(logger.debugs).toEqual(['Dropped 2 spurious row(s) from POINT tab']);
  });

  it('marks only tap-position analogs as controllable', () => {
    const base: Row = {
      eTerraKey: 'A1',
      sub: 'ARE',
      devtyp: 'TX',
      device_id: 'T1',
      rtu: 'ARIE3',
      rtu_address: '33053',
      address1: '312',
      card: '0',
      word: '203',
      protocol: 'IEC60870-101',
    };
    const cleaned = cleanAnalogExport(table([{ ...base, analog_id: 'TCP' }, { ...base, analog_id: 'MW' }]));

    expect(cleaned.rows.map((row) => [row.eTerraAlias, row.GenericType, row.Controllable])).toEqual([
      ['ARE/TX/T1/TCP', 'A', '1'],
      ['ARE/TX/T1/MW', 'A', '0'],
    ]);
    expect(cleaned.rows[0]?.GenericPointAddress).toBe('[(ARIE3:33053):312:203- A]');
  });

  it('normalizes control ids to text and tags control addresses', () => {
    const cleaned = cleanControlExport(
      table([
        {
          sub: 'ARE',
          devtyp: 'CB',
          device_id: 'CB1',
          point_id: 'SWDD',
          control_id: 1,
          rtu: 'AREC',
          rtu_address: '141',
          card: '252',
          phyadr: '6',
          protocol: 'MK2A',
          ctrlfunc: '1',
        },
      ])
    );

    expect(cleaned.rows[0]).toMatchObject({
      eTerraAlias: 'ARE/CB/CB1/SWDD',
      ControlId: '1',
      GenericType: 'CTRL',
      GenericPointAddress: '[(AREC:141):252:6-1 C]',
    });
  });

  it('addresses setpoints from IOA1 and IOA2', () => {
    const cleaned = cleanSetpointExport(
      table([
        {
          sub: 'ARE',
          devtyp: 'TX',
          device_id: 'T1',
          analog_id: 'TCP',
          rtu: 'ARIE3',
          rtu_address: '33053',
          address1: '312',
          card: '1',
          phyadr: '2',
          protocol: 'IEC60870-101',
          mdlparm2: '0',
        },
      ])
    );

    expect(cleaned.rows[0]).toMatchObject({
      GenericType: 'SETPOINT',
      IOA1: '1',
      IOA2: '2',
      GenericPointAddress: '[(ARIE3:33053):312:65538-2 C]',
    });
  });

  it('fails when a column the cleaner needs is missing', () => {
    const raw = rawPoint();
    delete raw.concat_conect;
    const error = catchError(() => cleanPointExport(table([raw])));

    expect(error).toBeInstanceOf(ReconError);
    expect(error).toMatchObject({
      code: 'SOURCE_COLUMN_MISSING',
      message: 'POINT tab is missing column(s): concat_conect',
    });
  });
});

describe('inventory cleaner', () => {
  it('maps record types to generic types', () => {
    expect(['A1', 'A2', 'A4', 'DI', 'DD', 'DO', 'AO', 'XX'].map(genericTypeFromPoType)).toEqual([
      'A',
      'A',
      'A',
      'SD',
      'DD',
      'C',
      'SETPOINT',
      'Unknown',
    ]);
  });

  it('rebuilds the MK2A offset and prefixes the address columns', () => {
    const cleaned = cleanInventory(table([rawInventory()]));

    expect(cleaned.rows).toEqual([
      {
        PO_Protocol: 'MK2A',
        PO_RTU: 'AREC_RTU',
        PO_Card: '109',
        PO_Word: '0',
        PO_IOA1: 0,
        PO_IOA2: 0,
        PO_Offset: '4',
        POAlias: 'C-1',
        ConfigHealth: 'GOOD',
        POType: 'DI',
        Shift: '3',
        Size: '1',
        Symbol: 'lamp',
        'TC Action': null,
        PO_GenericType: 'SD',
        GenericPointAddress: '[(AREC:141):109:4- SD]',
        PO_eTerraAlias: 'ARE/CB/CB1/SWDD',
      },
    ]);
  });

  it('drops excluded RTUs', () => {
    const logger = recordingLogger();
    const cleaned = cleanInventory(table([rawInventory(), rawInventory({ RTU: 'CUMW_RTU', comp_alias: 'X' })]), {
      logger,
    });

    expect(cleaned.rows.map((row) => row.POAlias)).toEqual(['C-1']);
    expect(logger.infos).toEqual(['Excluded 1 inventory row(s) on excluded RTUs']);
  });

  it('keeps the last record type among IEC inputs sharing card and word', () => {
    const logger = recordingLogger();
    const iec: Row = {
      RTU: 'ARIE3_RTU',
      'RTU Address': '33053',
      Protocol: 'IEC60870-101',
      addr1: '312',
      addr2: '203',
    };
    const cleaned = cleanInventory(
      table([
        { ...iec, recordType: 'DI', comp_alias: 'D-1' },
        { ...iec, recordType: 'A1', comp_alias: 'A-1' },
      ]),
      { logger }
    );

    expect(cleaned.rows.map((row) => [row.POAlias, row.GenericPointAddress])).toEqual([
      ['D-1', '[(ARIE3:33053):312:203- SD]'],
    ]);
    expect(logger.warnings).toEqual(['Dropping duplicate IEC inventory row']);
  });

  it('refuses duplicate addresses', () => {
    const raw = table([rawInventory(), rawInventory({ comp_alias: 'C-2' })]);
    const error = catchError(() => cleanInventory(raw));

    expect(error).toBeInstanceOf(ReconError);
    expect(error).toMatchObject({
      code: 'DUPLICATE_ADDRESS',
      context: { addresses: [{ address: '[(AREC:141):109:4- SD]', count: 2 }] },
    });
  });

  it('keeps the last duplicate when the operator allows it', () => {
    const logger = recordingLogger();
    const raw = table([rawInventory(), rawInventory({ comp_alias: 'C-2' })]);
    const cleaned = cleanInventory(raw, { logger, allowDuplicateAddresses: true });

    expect(cleaned.rows.map((row) => row.POAlias)).toEqual(['C-2']);
    expect(logger.warnings).toEqual(['Keeping the last of 2 inventory rows for [(AREC:141):109:4- SD]']);
  });
});

describe('comparison and test record cleaners', () => {
  it('renames the match report and keeps its three columns', () => {
    const cleaned = cleanMatchCompare(
      table([{ matched_status: 'Matched', GenericPointAddress: '[(AREC:141):109:4- SD]', Key: 'k1', extra: 'z' }])
    );

    expect(cleaned).toEqual({
      columns: ['HbddeCompareStatus', 'GenericPointAddress', 'HabCompKey'],
      rows: [{ HbddeCompareStatus: 'Matched', GenericPointAddress: '[(AREC:141):109:4- SD]', HabCompKey: 'k1' }],
    });
  });

  it('rebuilds tested control addresses through the RTU map', () => {
    const logger = recordingLogger();
    const rtuMap = RtuMap.fromPoints(table([{ RTU: 'AREC', RTUAddress: '141', Protocol: 'MK2A' }]));
    const cleaned = cleanAutoTests(
      table([
        { RTU: 'AREC_RTU', control_address: '252:6:1', control_status: 'Complete', control_result: 'OK' },
        { RTU: 'NOPE_RTU', control_address: '1:2:0', control_status: 'Complete', control_result: 'OK' },
        { RTU: 'AREC_RTU', control_address: '252:6', control_status: 'Complete', control_result: 'FAIL' },
      ]),
      rtuMap,
      { logger }
    );

    expect(cleaned.columns).toEqual(['AutoTestAddress', 'AutoTestStatus', 'AutoTestResult', 'GenericPointAddress']);
    expect(cleaned.rows.map((row) => row.GenericPointAddress)).toEqual(['[(AREC:141):252:6-1 C]', null, null]);
    expect(logger.warnings).toEqual(['Control address is not card:word:ctrlId: 252:6 (AREC_RTU)']);
  });
});
