import { describe, expect, it, vi } from 'vitest';
import type { Row } from '@pointrec/core';
import {
  RtuMap,
  combineIoa,
  computeInventoryOffset,
  deriveControlFunctionTag,
  deriveGenericPointAddress,
  deriveInventoryAddress,
  formatGenericPointAddress,
  parseGenericPointAddress,
  parseInteger,
  splitIoa,
  type ReconLogger,
} from '../src/index.js';

function recordingLogger(): ReconLogger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: vi.fn(),
    info: vi.fn(),
    warn: (message: string) => {
      warnings.push(message);
    },
    error: vi.fn(),
  };
}

describe('IOA packing', () => {
  it('splits what it combines', () => {
    for (const [a, b] of [
      [0, 0],
      [0, 203],
      [1, 0],
      [65535, 65535],
      [312, 4],
      [40000, 1],
    ]) {
      expect(splitIoa(combineIoa(a, b))).toEqual([a, b]);
    }
  });

  it('combines what it splits at the 16-bit boundaries', () => {
    const cases: [number, [number, number]][] = [
      [0, [0, 0]],
      [0xffff, [0, 65535]],
      [0x10000, [1, 0]],
      [0xffffffff, [65535, 65535]],
    ];
    for (const [ioa, parts] of cases) {
      expect(splitIoa(ioa)).toEqual(parts);
      expect(combineIoa(...parts)).toBe(ioa);
    }
  });

  it('rejects IOAs outside the unsigned 32-bit range', () => {
    expect(() => splitIoa(0x100000000)).toThrow(RangeError);
    expect(() => splitIoa(-1)).toThrow(RangeError);
  });

  it('packs the high field into the upper 16 bits', () => {
    expect(combineIoa(1, 2)).toBe(65538);
    expect(combineIoa(65535, 65535)).toBe(4294967295);
  });

  it('rejects fields outside 0..65535', () => {
    expect(() => combineIoa(65536, 0)).toThrow(RangeError);
    expect(() => combineIoa(0, -1)).toThrow(RangeError);
    expect(() => combineIoa(1.5, 0)).toThrow(RangeError);
  });
});

describe('deriveControlFunctionTag', () => {
  it('keeps 1 and collapses everything else to 0', () => {
    expect(deriveControlFunctionTag('1', 'SD')).toBe('1');
    expect(deriveControlFunctionTag('0', 'SD')).toBe('0');
    expect(deriveControlFunctionTag(1, 'CTRL')).toBe('1');
    expect(deriveControlFunctionTag('7', 'CTRL')).toBe('0');
  });

  it('always tags setpoints 2', () => {
    expect(deriveControlFunctionTag('1', 'SETPOINT')).toBe('2');
    expect(deriveControlFunctionTag(null, 'SETPOINT')).toBe('2');
  });
});

describe('parseInteger', () => {
  it('accepts whole numbers and digit strings only', () => {
    expect(parseInteger(12)).toBe(12);
    expect(parseInteger(' 42 ')).toBe(42);
    expect(parseInteger('4.0')).toBeNull();
    expect(parseInteger(2.5)).toBeNull();
    expect(parseInteger('abc')).toBeNull();
    expect(parseInteger(true)).toBeNull();
    expect(parseInteger(null)).toBeNull();
  });
});

describe('deriveGenericPointAddress', () => {
  it('addresses MK2A points by card and word', () => {
    const row: Row = {
      RTU: 'ANDE3',
      RTUAddress: '33018',
      Card: '2000',
      Word: '100',
      Protocol: 'MK2A',
      GenericType: 'DD',
    };
    expect(deriveGenericPointAddress(row).GenericPointAddress).toBe('[(ANDE3:33018):2000:100- DD]');
  });

  it('addresses MK2A controls with their control tag', () => {
    const row: Row = {
      RTU: 'AREC',
      RTUAddress: '141',
      Card: '252',
      Word: '6',
      Protocol: 'MK2A',
      GenericType: 'CTRL',
      CtrlFunc: '1',
    };
    expect(deriveGenericPointAddress(row).GenericPointAddress).toBe('[(AREC:141):252:6-1 C]');
  });

  it('packs IEC card and word into the IOA', () => {
    const row: Row = {
      RTU: 'ARIE3',
      RTUAddress: '33053',
      CASDU: '312',
      Card: '0',
      Word: '203',
      Protocol: 'IEC60870-101',
      GenericType: 'A',
    };
    expect(deriveGenericPointAddress(row)).toEqual({
      CASDU: '312',
      IOA: '203',
      IOA1: '0',
      IOA2: '203',
      GenericPointAddress: '[(ARIE3:33053):312:203- A]',
    });
  });

  it('gives a null address and logs when an IEC word is not an integer', () => {
    const logger = recordingLogger();
    const row: Row = {
      RTU: 'ARIE3',
      RTUAddress: '33053',
      CASDU: '312',
      Card: '1',
      Word: 'x7',
      Protocol: 'IEC60870-101',
      GenericType: 'SD',
    };
    const derived = deriveGenericPointAddress(row, logger);
    expect(derived.GenericPointAddress).toBeNull();
    expect(derived.IOA).toBeNull();
    expect(logger.warnings).toEqual(['Word is not an integer: rARIE3:c1:wx7 (SD)']);
  });
});

describe('parseGenericPointAddress', () => {
  it('round-trips the canonical examples', () => {
    for (const address of [
      '[(ANDE3:33018):2000:100- DD]',
      '[(AREC:141):109:4- SD]',
      '[(ARIE3:33053):312:203- A]',
      '[(AREC:141):252:6-1 C]',
    ]) {
      const parts = parseGenericPointAddress(address);
      expect(parts).not.toBeNull();
      if (parts) expect(formatGenericPointAddress(parts)).toBe(address);
    }
  });

  it('splits the fields', () => {
    expect(parseGenericPointAddress('[(AREC:141):252:6-1 C]')).toEqual({
      rtu: 'AREC',
      rtuAddress: '141',
      key1: '252',
      key2: '6',
      ctrlTag: '1',
      typeTag: 'C',
    });
  });

  it('rejects text outside the grammar', () => {
    expect(parseGenericPointAddress('AREC:141:252:6')).toBeNull();
    expect(parseGenericPointAddress('[(AREC:141):252:6-3 C]')).toBeNull();
  });
});

describe('inventory addresses', () => {
  it('rebuilds MK2A offsets from word and shift', () => {
    expect(computeInventoryOffset({ Protocol: 'MK2A', POType: 'DI', Word: '2', Shift: '3' })).toBe('20');
    expect(computeInventoryOffset({ Protocol: 'MK2A', POType: 'DD', Word: '2', Shift: '3' })).toBe('10');
    expect(computeInventoryOffset({ Protocol: 'MK2A', POType: 'A1', Word: '2', Shift: '3' })).toBe('3');
  });

  it('uses the IEC word unchanged', () => {
    expect(computeInventoryOffset({ Protocol: 'IEC60870-101', POType: 'DI', Word: '203', Shift: null })).toBe('203');
  });

  it('logs and returns null for a non-integer shift', () => {
    const logger = recordingLogger();
    const row: Row = { Protocol: 'MK2A', POType: 'DI', PO_RTU: 'AREC_RTU', Card: '109', Word: '2', Shift: '', Size: '1' };
    expect(computeInventoryOffset(row, logger)).toBeNull();
    expect(logger.warnings).toEqual(['shift is not an integer: rAREC_RTU:c109:w2:b:s1']);
  });

  it('formats MK2A inventory rows with card and offset', () => {
    const row: Row = {
      RTU: 'AREC',
      RTUAddress: '141',
      Protocol: 'MK2A',
      GenericType: 'SD',
      Card: '109',
      Offset: '4',
      ControlId: null,
    };
    expect(deriveInventoryAddress(row)).toBe('[(AREC:141):109:4- SD]');
  });

  it('tags setpoint outputs as controls', () => {
    const row: Row = {
      RTU: 'ARIE3',
      RTUAddress: '33053',
      Protocol: 'IEC60870-101',
      GenericType: 'SETPOINT',
      CASDU: '312',
      IOA: '65538',
      ControlId: '0',
    };
    expect(deriveInventoryAddress(row)).toBe('[(ARIE3:33053):312:65538-2 C]');
  });
});

describe('RtuMap', () => {
  const points = {
    columns: ['RTU', 'RTUAddress', 'Protocol'],
    rows: [
      { RTU: 'AREC', RTUAddress: '141', Protocol: 'MK2A' },
      { RTU: 'AREC', RTUAddress: '141', Protocol: 'MK2A' },
      { RTU: 'AREC', RTUAddress: '142', Protocol: 'MK2A' },
      { RTU: 'ARIE3', RTUAddress: '33053', Protocol: 'IEC60870-101' },
    ],
  };

  it('keeps distinct triples and resolves by the first one', () => {
    const map = RtuMap.fromPoints(points);
    expect(map.entries).toHaveLength(3);
    expect(map.resolve('AREC_RTU')).toEqual({ rtuAddress: '141', protocol: 'MK2A' });
    expect(map.resolve('ARIE3')).toEqual({ rtuAddress: '33053', protocol: 'IEC60870-101' });
  });

  it('returns a null pair for unknown RTUs', () => {
    expect(RtuMap.fromPoints(points).resolve('NOPE_RTU')).toEqual({ rtuAddress: null, protocol: null });
  });
});
