/**
 * Stage 5: attach the alarm-token comparison to each point.
 *
 * Point-level alarm fields come from one head row per alias, preferring a
 * `Matched` row. Per-state messages fill the fixed slots Alarm0..Alarm3.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, toText, unionColumns } from '@pointrec/core';
import { parseInteger } from '../address/index.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { isTrueFlag, percentage } from './values.js';

export const ALARM_SLOT_COUNT = 4;

export const ALARM_POINT_COLUMNS = [
  'CompAlarmEterraAlias',
  'CompAlarmPOAlias',
  'CompAlarmeTerraAlarmZone',
  'CompAlarmeTerraStatus',
  'CompAlarmPOsubstation',
  'CompAlarmPOAlarmZone',
  'CompAlarmPOAlarmRef',
  'CompAlarmPOStatus',
  'CompAlarmAlarmZoneMatch',
];

export function alarmSlotColumns(): string[] {
  const columns: string[] = [];
  for (let slot = 0; slot < ALARM_SLOT_COUNT; slot++) {
    columns.push(`Alarm${slot}_eTerraMessage`, `Alarm${slot}_POMessage`, `Alarm${slot}_MessageMatch`);
  }
  return columns;
}

const COUNT_COLUMNS = ['NumAlarms', 'NumAlarmsMatched', 'PercentAlarmsMatched'];

interface AlarmSummary {
  head: Row;
  slots: Record<string, CellValue>;
  numAlarms: number;
  numMatched: number;
}

function tokenOrder(row: Row): number {
  const value = parseInteger(cell(row, 'CompAlarmValue'));
  return value === null ? Number.POSITIVE_INFINITY : value;
}

function byTokenValue(a: Row, b: Row): number {
  const left = tokenOrder(a);
  const right = tokenOrder(b);
  return left === right ? 0 : left < right ? -1 : 1;
}

function summarize(alias: string, group: Row[], logger: ReconLogger): AlarmSummary {
  const head = group.find((row) => cell(row, 'CompAlarmPOStatus') === 'Matched') ?? group[0] ?? {};

  // Rows sharing a token value overwrite the slot; the last one in source order wins.
  const slots: Record<string, CellValue> = {};
  for (const row of [...group].sort(byTokenValue)) {
    const value = parseInteger(cell(row, 'CompAlarmValue'));
    if (value === null || value < 0 || value >= ALARM_SLOT_COUNT) {
      logger.warn(`Alarm value ${toText(cell(row, 'CompAlarmValue')) ?? 'null'} of ${alias} has no slot`);
      continue;
    }
    slots[`Alarm${value}_eTerraMessage`] = cell(row, 'CompAlarmeTerraAlarmMessage');
    slots[`Alarm${value}_POMessage`] = cell(row, 'CompAlarmPOAlarmMessage');
    slots[`Alarm${value}_MessageMatch`] = cell(row, 'CompAlarmAlarmMessageMatch');
  }

  return {
    head,
    slots,
    numAlarms: group.length,
    numMatched: group.filter((row) => isTrueFlag(cell(row, 'CompAlarmAlarmMessageMatch'))).length,
  };
}

export function attachAlarms(table: Table, alarms: Table, logger: ReconLogger = noopLogger): Table {
  const available = new Set(alarms.columns);
  const pointColumns = ALARM_POINT_COLUMNS.filter((column) => available.has(column));
  const slotColumns = alarmSlotColumns();

  const groups = new Map<string, Row[]>();
  for (const row of alarms.rows) {
    const alias = toText(cell(row, 'CompAlarmEterraAlias'));
    if (alias === null) continue;
    const group = groups.get(alias);
    if (group) {
      group.push(row);
    } else {
      groups.set(alias, [row]);
    }
  }

  const summaries = new Map<string, AlarmSummary>();
  for (const [alias, group] of groups) {
    summaries.set(alias, summarize(alias, group, logger));
  }

  const rows = table.rows.map((row) => {
    const alias = toText(cell(row, 'eTerraAlias'));
    const summary = alias === null ? undefined : summaries.get(alias);
    const out: Row = { ...row };
    for (const column of pointColumns) {
      out[column] = summary ? cell(summary.head, column) : null;
    }
    for (const column of slotColumns) {
      out[column] = summary?.slots[column] ?? null;
    }
    out.NumAlarms = summary?.numAlarms ?? 0;
    out.NumAlarmsMatched = summary?.numMatched ?? 0;
    out.PercentAlarmsMatched = summary ? percentage(summary.numMatched, summary.numAlarms) : null;
    return out;
  });

  return { columns: unionColumns(table.columns, pointColumns, slotColumns, COUNT_COLUMNS), rows };
}
