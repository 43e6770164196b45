/**
 * Stages 1 and 2: combine the point and analog tabs, order them by address
 * and cut them down to the requested scope.
 */

import type { Row, Table } from '@pointrec/core';
import { cell, toText } from '@pointrec/core';
import { scopeColumn, type ReconScope } from '../types/scope.js';

export const COMMON_COLUMNS = [
  'GenericPointAddress',
  'CASDU',
  'Protocol',
  'RTU',
  'Card',
  'RTUAddress',
  'RTUId',
  'IOA2',
  'IOA1',
  'IOA',
  'PointId',
  'GenericType',
  'DeviceType',
  'DeviceName',
  'DeviceId',
  'Sub',
  'Word',
  'eTerraKey',
  'eTerraAlias',
  'Controllable',
];

/** Review columns maintained by hand in the engineering workbook */
export const REVIEW_COLUMNS = [
  'IGNORE_RTU',
  'IGNORE_POINT',
  'OLD_DATA',
  'GridIncomer',
  'eTerra Alias',
  'ICCP_POINTNAME',
  'ICCP->PO',
  'ICCP_ALIAS',
  'PowerOn Alias',
  'PowerOn Alias Exists',
  'PowerOn Alias Linked to SCADA',
];

function project(rows: Row[], columns: string[]): Row[] {
  return rows.map((row) => {
    const out: Row = {};
    for (const column of columns) {
      out[column] = cell(row, column);
    }
    return out;
  });
}

/**
 * Code-unit order on `GenericPointAddress`, rows without an address last.
 * The sort is stable, so equal addresses keep their input order.
 */
export function sortByAddress(rows: Row[]): Row[] {
  return [...rows].sort((a, b) => {
    const left = toText(cell(a, 'GenericPointAddress'));
    const right = toText(cell(b, 'GenericPointAddress'));
    if (left === right) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return left < right ? -1 : 1;
  });
}

export function unionPointTables(points: Table, analogs: Table): Table {
  const present = new Set([...points.columns, ...analogs.columns]);
  const columns = [...COMMON_COLUMNS, ...REVIEW_COLUMNS.filter((column) => present.has(column))];
  return {
    columns,
    rows: sortByAddress([...project(points.rows, columns), ...project(analogs.rows, columns)]),
  };
}

export function matchesScope(row: Row, scope: ReconScope): boolean {
  const column = scopeColumn(scope);
  if (column === null || scope.kind === 'all') return true;
  return cell(row, column) === scope.name;
}

export function applyScope(table: Table, scope: ReconScope): Table {
  return { columns: [...table.columns], rows: table.rows.filter((row) => matchesScope(row, scope)) };
}

export function excludeRtus(table: Table, rtus: string[]): Table {
  if (rtus.length === 0) return table;
  const excluded = new Set(rtus);
  return {
    columns: [...table.columns],
    rows: table.rows.filter((row) => {
      const rtu = toText(cell(row, 'RTU'));
      return rtu === null || !excluded.has(rtu);
    }),
  };
}
