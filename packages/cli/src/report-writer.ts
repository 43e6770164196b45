/**
 * Defect workbook: a `Points` sheet with one row per merged point, a
 * `Summary` sheet with one row per predicate, then one points section per RTU
 */

import { join } from 'node:path';
import type { Row, Table } from '@pointrec/core';
import { cell, isBlank, toText } from '@pointrec/core';
import { writeExcelWorkbook, type WorkbookSheet } from '@pointrec/connector-file';
import { noopLogger, scopeKey, type PredicateSummary, type ReconLogger, type ReconScope } from '@pointrec/recon-core';
import { POINTS_SHEET, withReviewColumns } from './review-carry-forward.js';

export const SUMMARY_SHEET = 'Summary';

export function defectReportPath(outputDir: string, scope: ReconScope): string {
  return join(outputDir, `defect-report-${scopeKey(scope)}.xlsx`);
}

export function summaryTable(summary: PredicateSummary[]): Table {
  return {
    columns: ['Predicate', 'Name', 'Count'],
    rows: summary.map((entry) => ({ Predicate: entry.id, Name: entry.name, Count: entry.count })),
  };
}

/** Section header -> merged column */
const POINT_FIELDS: ReadonlyArray<readonly [string, string]> = [
  ['Type', 'GenericType'],
  ['SCADA Address', 'GenericPointAddress'],
  ['eTerra Key', 'eTerraKey'],
  ['PowerOn Alias', 'POAlias'],
  ['Match Status', 'HbddeCompareStatus'],
  ['PowerOn Config Health Status', 'ConfigHealth'],
  ['Control Zone Status', 'CompAlarmAlarmZoneMatch'],
];

const CONTROL_FIELDS = ['Ctrl1Addr', 'Ctrl1Name', 'Ctrl2Addr', 'Ctrl2Name'];

const ALARM_FIELDS = [
  'CompAlarmeTerraAlarmZone',
  'CompAlarmeTerraStatus',
  'CompAlarmPOsubstation',
  'CompAlarmPOAlarmZone',
  'CompAlarmPOAlarmRef',
  'CompAlarmPOStatus',
  'CompAlarmAlarmZoneMatch',
  'Alarm0_MessageMatch',
  'Alarm1_MessageMatch',
  'Alarm2_MessageMatch',
  'Alarm3_MessageMatch',
];

const SECTION_TYPES = new Set(['SD', 'DD']);

function sectionRow(row: Row, predicateIds: string[]): Row {
  const out: Row = {};
  for (const [header, column] of POINT_FIELDS) {
    out[header] = cell(row, column);
  }

  const controllable = cell(row, 'Controllable') === '1';
  for (const column of CONTROL_FIELDS) {
    out[column] = controllable ? cell(row, column) : '';
  }

  const hasAlarms = !isBlank(cell(row, 'CompAlarmEterraAlias'));
  for (const column of ALARM_FIELDS) {
    out[column] = hasAlarms ? cell(row, column) : null;
  }

  for (const id of predicateIds) {
    out[id] = cell(row, id);
  }
  return out;
}

/**
 * Points section of one RTU: status points only, with controls, alarm
 * comparison and one column per predicate
 */
export function rtuPointsSection(rows: Row[], predicateIds: string[]): Table {
  return {
    columns: [...POINT_FIELDS.map(([header]) => header), ...CONTROL_FIELDS, ...ALARM_FIELDS, ...predicateIds],
    rows: rows
      .filter((row) => SECTION_TYPES.has(toText(cell(row, 'GenericType')) ?? ''))
      .map((row) => sectionRow(row, predicateIds)),
  };
}

/**
 * One sheet per RTU, in the order the RTUs first appear
 */
export function rtuSheets(points: Table, predicateIds: string[]): WorkbookSheet[] {
  const byRtu = new Map<string, Row[]>();
  for (const row of points.rows) {
    const rtu = toText(cell(row, 'RTU'));
    if (rtu === null || rtu.trim() === '') continue;
    const group = byRtu.get(rtu);
    if (group) {
      group.push(row);
    } else {
      byRtu.set(rtu, [row]);
    }
  }

  return [...byRtu.entries()].map(([rtu, rows]): WorkbookSheet => ({
    name: rtu,
    table: rtuPointsSection(rows, predicateIds),
    columnWidth: 'auto',
  }));
}

export interface DefectReport {
  points: Table;
  summary: PredicateSummary[];
}

/**
 * Write the workbook, replacing any earlier file at `filePath`. Returns the
 * sheet names as written.
 */
export async function writeDefectReport(
  filePath: string,
  report: DefectReport,
  logger: ReconLogger = noopLogger
): Promise<string[]> {
  const perRtu = rtuSheets(
    report.points,
    report.summary.map((entry) => entry.id)
  );
  const names = await writeExcelWorkbook(filePath, [
    { name: POINTS_SHEET, table: withReviewColumns(report.points) },
    { name: SUMMARY_SHEET, table: summaryTable(report.summary) },
    ...perRtu,
  ]);

  logger.info(`Wrote ${report.points.rows.length} rows and ${perRtu.length} RTU sheet(s) to ${filePath}`, {
    filePath,
    predicates: report.summary.length,
  });
  return names;
}
