/**
 * Stage 3: placeholder rows for controls whose point is missing from the
 * POINT and ANALOG tabs, so those controls still reach the report.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, toText, unionColumns } from '@pointrec/core';
import { pointAliasFor, type ReconExceptions } from './exceptions.js';

/** RTUId given to placeholder rows; sorts after every real RTU */
export const DUMMY_RTU_ID = '(€€€€€€€€:)';

export type DummySource = 'CTRL' | 'SETPNT';

export interface DummyCandidates {
  controls: Table;
  setpoints: Table;
}

function placeholder(control: Row, pointAlias: string, source: DummySource, columns: string[]): Row {
  const row: Row = {};
  for (const column of columns) {
    row[column] = null;
  }
  const values: Record<string, CellValue> = {
    eTerraAlias: pointAlias,
    Sub: cell(control, 'Sub'),
    DeviceType: cell(control, 'DeviceType'),
    DeviceId: cell(control, 'DeviceId'),
    DeviceName: cell(control, 'DeviceName'),
    PointId: pointAlias.slice(pointAlias.lastIndexOf('/') + 1),
    RTU: cell(control, 'RTU'),
    Protocol: cell(control, 'Protocol'),
    RTUId: DUMMY_RTU_ID,
    GenericType: 'DUMMY',
    GenericPointAddress: null,
    Controllable: '1',
    DummySource: source,
  };
  return { ...row, ...values };
}

/**
 * Append one placeholder per control alias that has no point row.
 * `knownAliases` holds every point alias of the unscoped export; the
 * candidates are already cut down to the scope.
 */
export function appendDummyRows(
  table: Table,
  candidates: DummyCandidates,
  knownAliases: ReadonlySet<string>,
  exceptions: ReconExceptions
): Table {
  const columns = unionColumns(table.columns, ['DummySource']);
  const dummies = new Map<string, Row>();

  const collect = (rows: Row[], source: DummySource): void => {
    for (const control of rows) {
      const alias = toText(cell(control, 'eTerraAlias'));
      if (alias === null) continue;
      const pointAlias = pointAliasFor(alias, exceptions);
      if (knownAliases.has(pointAlias) || dummies.has(pointAlias)) continue;
      dummies.set(pointAlias, placeholder(control, pointAlias, source, columns));
    }
  };
  collect(candidates.controls.rows, 'CTRL');
  collect(candidates.setpoints.rows, 'SETPNT');

  const ordered = [...dummies.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, row]) => row);

  return {
    columns,
    rows: [...table.rows.map((row) => ({ DummySource: null, ...row })), ...ordered],
  };
}
