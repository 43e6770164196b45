/**
 * Stage 6: resolve up to two controls per point and attach what the
 * inventory, the match report and both kinds of control test say about them.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, isBlank, toText, unionColumns } from '@pointrec/core';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { controlAliasFor, type ReconExceptions } from './exceptions.js';
import { indexBy } from './join.js';
import { percentage } from './values.js';

export const MAX_CONTROL_SLOTS = 2;

/** Manual commissioning test names recorded for each control */
export interface CommissioningTestNames {
  visualCheck: string;
  controlSent: string;
  actionVerified: string;
}

export const DEFAULT_COMMISSIONING_TESTS: CommissioningTestNames = {
  visualCheck: 'Visual Check',
  controlSent: 'Control Sent',
  actionVerified: 'Action Verified',
};

export interface ControlSources {
  controls: Table;
  setpoints: Table;
  inventory: Table;
  matchCompare: Table;
  autoTests: Table;
  commissioning: Table;
}

export interface AttachControlsOptions {
  exceptions: ReconExceptions;
  commissioningTests?: CommissioningTestNames;
  logger?: ReconLogger;
}

const DETAIL_SUFFIXES = [
  'MatchStatus',
  'ConfigHealth',
  'TelecontrolAction',
  'POAlias',
  'VisualCheck',
  'ControlSent',
  'ActionVerified',
  'AutoTestStatus',
  'TestResult',
] as const;

type DetailSuffix = (typeof DETAIL_SUFFIXES)[number];

const COUNT_COLUMNS = [
  'NumControls',
  'NumControlsCommissionOk',
  'NumControlsAllCommissionOk',
  'PercentControlsCommissionOk',
  'PercentControlsAllCommissionOk',
];

export function controlColumns(): string[] {
  const columns: string[] = [];
  for (let n = 1; n <= MAX_CONTROL_SLOTS; n++) {
    columns.push(`Ctrl${n}Addr`, `Ctrl${n}Name`);
  }
  for (let n = 1; n <= MAX_CONTROL_SLOTS; n++) {
    columns.push(...DETAIL_SUFFIXES.map((suffix) => `Ctrl${n}${suffix}`));
  }
  return [...columns, ...COUNT_COLUMNS];
}

interface ResolvedControl {
  address: CellValue;
  name: CellValue;
}

/**
 * Latest result per test name for one control address
 */
function latestResults(tests: Row[]): Map<string, CellValue> {
  const latest = new Map<string, { date: string; result: CellValue }>();
  for (const test of tests) {
    const name = toText(cell(test, 'CommissioningTestName'));
    if (name === null) continue;
    const date = toText(cell(test, 'CommissioningTestdate')) ?? '';
    const current = latest.get(name);
    if (!current || date >= current.date) {
      latest.set(name, { date, result: cell(test, 'CommissioningResult') });
    }
  }
  return new Map([...latest.entries()].map(([name, entry]) => [name, entry.result]));
}

class ControlLookups {
  readonly controlsByAlias: Map<string, Row[]>;
  readonly setpointsByAlias: Map<string, Row[]>;
  private readonly inventory: Map<string, Row[]>;
  private readonly matches: Map<string, Row[]>;
  private readonly autoTests: Map<string, Row[]>;
  private readonly commissioning: Map<string, Map<string, CellValue>>;

  constructor(sources: ControlSources, private readonly testNames: CommissioningTestNames) {
    this.controlsByAlias = indexBy(sources.controls.rows, 'eTerraAlias');
    this.setpointsByAlias = indexBy(sources.setpoints.rows, 'eTerraAlias');
    this.inventory = indexBy(sources.inventory.rows, 'GenericPointAddress');
    this.matches = indexBy(sources.matchCompare.rows, 'GenericPointAddress');
    this.autoTests = indexBy(sources.autoTests.rows, 'GenericPointAddress');
    this.commissioning = new Map(
      [...indexBy(sources.commissioning.rows, 'GenericPointAddress').entries()].map(
        ([address, tests]) => [address, latestResults(tests)]
      )
    );
  }

  details(address: string): Record<DetailSuffix, CellValue> {
    const inventory = this.inventory.get(address)?.[0];
    const match = this.matches.get(address)?.[0];
    const autoTests = this.autoTests.get(address);
    const autoTest = autoTests?.[autoTests.length - 1];
    const manual = this.commissioning.get(address);

    return {
      MatchStatus: match ? cell(match, 'HbddeCompareStatus') : null,
      ConfigHealth: inventory ? cell(inventory, 'ConfigHealth') : null,
      TelecontrolAction: inventory ? cell(inventory, 'TC Action') : null,
      POAlias: inventory ? cell(inventory, 'POAlias') : null,
      VisualCheck: manual?.get(this.testNames.visualCheck) ?? null,
      ControlSent: manual?.get(this.testNames.controlSent) ?? null,
      ActionVerified: manual?.get(this.testNames.actionVerified) ?? null,
      AutoTestStatus: autoTest ? cell(autoTest, 'AutoTestStatus') : null,
      TestResult: autoTest ? cell(autoTest, 'AutoTestResult') : null,
    };
  }
}

function resolveControls(
  row: Row,
  lookups: ControlLookups,
  exceptions: ReconExceptions
): { slots: ResolvedControl[]; found: number } {
  const alias = toText(cell(row, 'eTerraAlias'));
  if (alias === null) return { slots: [], found: 0 };

  const slots: ResolvedControl[] = [];
  let found = 0;

  if (cell(row, 'Controllable') === '1') {
    const controls = lookups.controlsByAlias.get(controlAliasFor(alias, exceptions)) ?? [];
    found += controls.length;
    for (const control of controls.slice(0, MAX_CONTROL_SLOTS)) {
      slots.push({ address: cell(control, 'GenericPointAddress'), name: cell(control, 'ControlId') });
    }
  }

  const takesSetpoint =
    cell(row, 'GenericType') === 'A' ||
    (cell(row, 'GenericType') === 'DUMMY' && cell(row, 'DummySource') === 'SETPNT');
  if (takesSetpoint) {
    const setpoint = lookups.setpointsByAlias.get(alias)?.[0];
    if (setpoint) {
      found += 1;
      const resolved = { address: cell(setpoint, 'GenericPointAddress'), name: 'SETPOINT' };
      if (slots.length === 0) {
        slots.push(resolved);
      } else {
        slots[0] = resolved;
      }
    }
  }

  return { slots, found };
}

export function attachControls(table: Table, sources: ControlSources, options: AttachControlsOptions): Table {
  const logger = options.logger ?? noopLogger;
  const lookups = new ControlLookups(sources, options.commissioningTests ?? DEFAULT_COMMISSIONING_TESTS);
  const columns = controlColumns();

  const rows = table.rows.map((row) => {
    const out: Row = { ...row };
    for (const column of columns) {
      out[column] = null;
    }

    const { slots, found } = resolveControls(row, lookups, options.exceptions);
    if (found > MAX_CONTROL_SLOTS) {
      logger.warn(`${toText(cell(row, 'eTerraAlias')) ?? '?'} has ${found} controls; only ${MAX_CONTROL_SLOTS} are reported`);
    }

    let materialized = 0;
    let commissionOk = 0;
    let allCommissionOk = 0;

    for (let n = 1; n <= MAX_CONTROL_SLOTS; n++) {
      const control = slots[n - 1];
      out[`Ctrl${n}Addr`] = control?.address ?? '';
      out[`Ctrl${n}Name`] = control?.name ?? '';

      const address = control ? toText(control.address) : null;
      if (address === null || isBlank(address)) continue;

      materialized += 1;
      const details = lookups.details(address);
      for (const suffix of DETAIL_SUFFIXES) {
        out[`Ctrl${n}${suffix}`] = details[suffix];
      }
      if (details.ActionVerified === 'OK') {
        commissionOk += 1;
        if (details.VisualCheck === 'OK' && details.ControlSent === 'OK') {
          allCommissionOk += 1;
        }
      }
    }

    out.NumControls = materialized;
    out.NumControlsCommissionOk = commissionOk;
    out.NumControlsAllCommissionOk = allCommissionOk;
    out.PercentControlsCommissionOk = percentage(commissionOk, materialized);
    out.PercentControlsAllCommissionOk = percentage(allCommissionOk, materialized);
    return out;
  });

  return { columns: unionColumns(table.columns, columns), rows };
}
