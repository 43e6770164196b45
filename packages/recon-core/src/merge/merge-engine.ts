/**
 * Merge Engine
 *
 * Builds one row per engineering point from the cleaned source tables.
 * Each stage is a pure pass over the previous table; the stages run in a
 * fixed order because later ones read columns added by earlier ones.
 */

import type { ComponentDirectory, Table } from '@pointrec/core';
import { cell, toText } from '@pointrec/core';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { ALL_SCOPE, type ReconScope } from '../types/scope.js';
import { attachAlarms } from './alarms.js';
import { attachControls, type CommissioningTestNames } from './controls.js';
import { appendDummyRows } from './dummies.js';
import { resolveExceptions, type ReconExceptions } from './exceptions.js';
import { deriveRowFlags } from './flags.js';
import { assertRowCount, leftJoinUnique } from './join.js';
import { applyScope, excludeRtus, unionPointTables } from './union.js';

/** Cleaned tables the merge reads */
export interface MergeInputs {
  points: Table;
  analogs: Table;
  controls: Table;
  setpoints: Table;
  matchCompare: Table;
  inventory: Table;
  alarmCompare: Table;
  autoTests: Table;
  commissioning: Table;
}

export interface MergeOptions {
  scope?: ReconScope;
  exceptions?: Partial<ReconExceptions>;
  commissioningTests?: CommissioningTestNames;
  /** Control-system alias lookup for the existence flags */
  directory?: ComponentDirectory;
  logger?: ReconLogger;
}

export class MergeEngine {
  private readonly logger: ReconLogger;
  private readonly exceptions: ReconExceptions;

  constructor(private readonly options: MergeOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.exceptions = resolveExceptions(options.exceptions);
  }

  async merge(inputs: MergeInputs, scope: ReconScope = this.options.scope ?? ALL_SCOPE): Promise<Table> {
    const union = unionPointTables(inputs.points, inputs.analogs);
    this.stage('Combined point and analog tabs', union);

    const scoped = excludeRtus(applyScope(union, scope), this.exceptions.excludedPointRtus);
    this.stage('Applied scope', scoped);

    const knownAliases = new Set<string>();
    for (const row of union.rows) {
      const alias = toText(cell(row, 'eTerraAlias'));
      if (alias !== null) knownAliases.add(alias);
    }
    const withDummies = appendDummyRows(
      scoped,
      {
        controls: excludeRtus(applyScope(inputs.controls, scope), this.exceptions.excludedPointRtus),
        setpoints: excludeRtus(applyScope(inputs.setpoints, scope), this.exceptions.excludedPointRtus),
      },
      knownAliases,
      this.exceptions
    );
    this.stage('Added placeholder rows for orphan controls', withDummies);
    const expected = withDummies.rows.length;

    let merged = leftJoinUnique(withDummies, inputs.matchCompare, {
      rightName: 'matchCompare',
      dropColumns: ['HabCompKey'],
    });
    this.stage('Joined match comparison', merged);

    merged = leftJoinUnique(merged, inputs.inventory, { rightName: 'inventory' });
    this.stage('Joined inventory', merged);

    merged = attachAlarms(merged, inputs.alarmCompare, this.logger);
    assertRowCount('Alarm attachment', expected, merged.rows.length);
    this.stage('Attached alarm comparison', merged);

    merged = attachControls(merged, inputs, {
      exceptions: this.exceptions,
      commissioningTests: this.options.commissioningTests,
      logger: this.logger,
    });
    assertRowCount('Control attachment', expected, merged.rows.length);
    this.stage('Attached controls', merged);

    merged = await deriveRowFlags(merged, this.options.directory);
    assertRowCount('Row flags', expected, merged.rows.length);
    this.stage('Derived row flags', merged);

    return merged;
  }

  private stage(name: string, table: Table): void {
    this.logger.info(`${name}: ${table.rows.length} rows`, { rows: table.rows.length, columns: table.columns.length });
  }
}
