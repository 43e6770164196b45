/**
 * Cleaners for the tabs of the engineering (eTerra) workbook export
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, isMissing, toText } from '@pointrec/core';
import { deriveGenericPointAddress, formatRtuId, parseInteger } from '../address/index.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { sourceLayout, type SourceKind } from './source-columns.js';
import {
  filterRows,
  joinAlias,
  renameColumns,
  requireColumns,
  selectColumns,
  withColumns,
} from './table-ops.js';

export interface CleanOptions {
  logger?: ReconLogger;
}

const ADDRESS_COLUMNS = ['CASDU', 'IOA', 'IOA1', 'IOA2', 'GenericPointAddress'];

function includesText(value: CellValue, needle: string): boolean {
  const text = toText(value);
  return text !== null && text.includes(needle);
}

/**
 * Rows the engineering model keeps as placeholders for spurious alarms
 */
export function isIgnoredEterraRow(row: Row): boolean {
  if (includesText(cell(row, 'PointName'), 'SPURIOUS ALARM')) return true;
  if (includesText(cell(row, 'DeviceId'), 'SPURIOUS')) return true;
  return cell(row, 'DeviceType') === 'UNUSED' && cell(row, 'DeviceId') === 'SPURIOUS';
}

function identityColumns(row: Row): Record<string, CellValue> {
  const rtu = cell(row, 'RTU');
  return {
    eTerraAlias: joinAlias(row),
    RTUId: isMissing(rtu) ? null : formatRtuId(rtu, cell(row, 'RTUAddress')),
  };
}

function trimKey(row: Row): Record<string, CellValue> {
  if (!('eTerraKey' in row)) return {};
  const key = toText(cell(row, 'eTerraKey'));
  return { eTerraKey: key === null ? null : key.trim() };
}

function prepare(raw: Table, kind: SourceKind, source: string): Table {
  const layout = sourceLayout(kind);
  const renamed = renameColumns(raw, layout.renames);
  requireColumns(renamed, layout.required, source);
  return renamed;
}

function finish(table: Table, kind: SourceKind, logger: ReconLogger, source: string): Table {
  const kept = selectColumns(table, sourceLayout(kind).keep);
  const cleaned = filterRows(kept, (row) => !isIgnoredEterraRow(row));
  const dropped = kept.rows.length - cleaned.rows.length;
  if (dropped > 0) {
    logger.debug(`Dropped ${dropped} spurious row(s) from ${source}`);
  }
  return cleaned;
}

function withAddresses(table: Table, logger: ReconLogger): Table {
  return withColumns(table, ADDRESS_COLUMNS, (row) => ({ ...deriveGenericPointAddress(row, logger) }));
}

function sizeFromConnection(value: CellValue): number | null {
  const connected = parseInteger(value);
  if (connected === 1) return 2;
  if (connected === 0) return 1;
  return connected;
}

function pointGenericType(row: Row): string | null {
  if (isMissing(cell(row, 'Card')) && isMissing(cell(row, 'CASDU'))) {
    return 'DUMMY';
  }
  switch (cell(row, 'Size')) {
    case 1:
      return 'SD';
    case 2:
      return 'DD';
    default:
      return null;
  }
}

/**
 * POINT tab: digital inputs. `Size` comes from `concat_conect` and decides SD vs DD.
 */
export function cleanPointExport(raw: Table, options: CleanOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  let table = prepare(raw, 'point', 'POINT tab');

  table = withColumns(table, ['eTerraAlias', 'RTUId', 'Size', 'Controllable'], (row) => ({
    ...identityColumns(row),
    Size: sizeFromConnection(cell(row, 'concat_conect')),
    Controllable: toText(cell(row, 'Controllable')),
  }));
  table = withColumns(table, ['GenericType'], (row) => ({ GenericType: pointGenericType(row) }));
  table = withAddresses(table, logger);
  table = withColumns(table, [], trimKey);

  return finish(table, 'point', logger, 'POINT tab');
}

/**
 * ANALOG tab. Tap-position analogs (`TCP`) are the only controllable analogs.
 */
export function cleanAnalogExport(raw: Table, options: CleanOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  let table = prepare(raw, 'analog', 'ANALOG tab');

  table = withColumns(table, ['eTerraAlias', 'RTUId', 'GenericType'], (row) => ({
    ...identityColumns(row),
    GenericType: 'A',
  }));
  table = withAddresses(table, logger);
  table = withColumns(table, ['Controllable'], (row) => ({
    ...trimKey(row),
    Controllable: cell(row, 'PointId') === 'TCP' ? '1' : '0',
  }));

  return finish(table, 'analog', logger, 'ANALOG tab');
}

/**
 * CTRL tab: digital controls, 0 to 2 per controllable point
 */
export function cleanControlExport(raw: Table, options: CleanOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  let table = prepare(raw, 'control', 'CTRL tab');

  table = withColumns(table, ['eTerraAlias', 'RTUId', 'GenericType'], (row) => ({
    ...identityColumns(row),
    ControlId: toText(cell(row, 'ControlId')),
    GenericType: 'CTRL',
  }));
  table = withAddresses(table, logger);
  table = withColumns(table, [], trimKey);

  return finish(table, 'control', logger, 'CTRL tab');
}

/**
 * SETPNT tab: analog setpoints, addressed by IOA1/IOA2 on IEC RTUs
 */
export function cleanSetpointExport(raw: Table, options: CleanOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  let table = prepare(raw, 'setpoint', 'SETPNT tab');

  table = withColumns(table, ['GenericType', 'RTUId', 'eTerraAlias', 'Card', 'Word'], (row) => ({
    GenericType: 'SETPOINT',
    ...identityColumns(row),
    Card: cell(row, 'IOA1'),
    Word: cell(row, 'IOA2'),
  }));
  table = withAddresses(table, logger);
  table = withColumns(table, [], trimKey);

  return finish(table, 'setpoint', logger, 'SETPNT tab');
}
