/**
 * Cleaners for the two comparison reports produced outside this tool:
 * the address match report and the alarm-token comparison.
 */

import type { Table } from '@pointrec/core';
import { sourceLayout } from './source-columns.js';
import { renameColumns, requireColumns, selectColumns } from './table-ops.js';

export function cleanMatchCompare(raw: Table): Table {
  const layout = sourceLayout('matchCompare');
  const table = renameColumns(raw, layout.renames);
  requireColumns(table, layout.required, 'Match comparison report');
  return selectColumns(table, layout.keep);
}

/** `Event Detail` sheet of the alarm comparison workbook */
export function cleanAlarmCompare(raw: Table): Table {
  const layout = sourceLayout('alarmCompare');
  const table = renameColumns(raw, layout.renames);
  requireColumns(table, layout.required, 'Alarm comparison report');
  return selectColumns(table, layout.keep);
}
