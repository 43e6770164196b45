import type { ConnectionState, ConnectorConfig, IConnector, Row, Table, WriteResult } from '@pointrec/core';
import { extractColumnNames } from '@pointrec/core';
import { vi } from 'vitest';
import type { ReconLogger } from '../src/index.js';

export function table(rows: Row[], columns: string[] = extractColumnNames(rows)): Table {
  return { columns, rows };
}

export const EMPTY: Table = { columns: [], rows: [] };

export interface RecordingLogger extends ReconLogger {
  warnings: string[];
  infos: string[];
  debugs: string[];
}

export function recordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const infos: string[] = [];
  const debugs: string[] = [];
  return {
    warnings,
    infos,
    debugs,
    debug: (message: string) => {
      debugs.push(message);
    },
    info: (message: string) => {
      infos.push(message);
    },
    warn: (message: string) => {
      warnings.push(message);
    },
    error: vi.fn(),
  };
}

/** POINT tab row as exported, MK2A RTU AREC at address 141 */
export function rawPoint(overrides: Row = {}): Row {
  return {
    eTerraKey: ' K1 ',
    sub: 'ARE',
    devtyp: 'CB',
    device_id: 'CB1',
    device_name: 'Breaker 1',
    point_id: 'SWDD',
    point_name: 'CB1 status',
    rtu: 'AREC',
    rtu_address: '141',
    card: '109',
    phyadr: '4',
    protocol: 'MK2A',
    ctrlable: '1',
    concat_conect: '1',
    ...overrides,
  };
}

/** Cleaned point row, as the merge engine receives it */
export function point(alias: string, address: string | null, overrides: Row = {}): Row {
  const [sub = '', deviceType = '', deviceId = '', pointId = ''] = alias.split('/');
  return {
    eTerraKey: `K-${alias}`,
    eTerraAlias: alias,
    Sub: sub,
    DeviceType: deviceType,
    DeviceId: deviceId,
    DeviceName: `${deviceId} name`,
    PointId: pointId,
    RTU: 'AREC',
    RTUAddress: '141',
    Card: '109',
    Word: '4',
    CASDU: null,
    IOA: null,
    IOA1: null,
    IOA2: null,
    Protocol: 'MK2A',
    Controllable: '0',
    RTUId: '(AREC:141)',
    GenericPointAddress: address,
    GenericType: 'DD',
    ...overrides,
  };
}

/** Cleaned CTRL row */
export function control(alias: string, address: string, controlId: string, overrides: Row = {}): Row {
  const [sub = '', deviceType = '', deviceId = '', pointId = ''] = alias.split('/');
  return {
    eTerraAlias: alias,
    Sub: sub,
    DeviceType: deviceType,
    DeviceId: deviceId,
    DeviceName: `${deviceId} name`,
    PointId: pointId,
    ControlId: controlId,
    RTU: 'AREC',
    RTUAddress: '141',
    Protocol: 'MK2A',
    RTUId: '(AREC:141)',
    GenericPointAddress: address,
    GenericType: 'CTRL',
    ...overrides,
  };
}

/** In-process store; `stored === null` means the store does not exist yet */
export class MemoryConnector implements IConnector {
  readonly config: ConnectorConfig;
  state: ConnectionState = 'disconnected';
  reads = 0;

  constructor(
    id: string,
    public stored: Table | null = null
  ) {
    this.config = { id, name: id, type: 'memory' };
  }

  async connect(): Promise<void> {
    this.state = 'connected';
  }

  async disconnect(): Promise<void> {
    this.state = 'disconnected';
  }

  async readRows(): Promise<Table> {
    this.reads += 1;
    const stored = this.stored ?? { columns: [], rows: [] };
    return {
      columns: [...stored.columns],
      rows: stored.rows.map((row) => ({ ...row })),
    };
  }

  async replaceRows(next: Table): Promise<WriteResult> {
    this.stored = { columns: [...next.columns], rows: next.rows.map((row) => ({ ...row })) };
    return { success: next.rows.length, failed: 0 };
  }

  async testConnection(): Promise<boolean> {
    return this.stored !== null;
  }
}

export function memoryStores(): { stores: Map<string, MemoryConnector>; open: (key: string) => MemoryConnector } {
  const stores = new Map<string, MemoryConnector>();
  const open = (key: string): MemoryConnector => {
    const existing = stores.get(key);
    if (existing) return existing;
    const created = new MemoryConnector(key);
    stores.set(key, created);
    return created;
  };
  return { stores, open };
}
