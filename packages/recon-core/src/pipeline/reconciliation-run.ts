/**
 * Reconciliation Run
 *
 * One batch run for one scope: read the source extracts, clean and merge
 * them (or restore the merged table from the cache), then evaluate the
 * defect library.
 */

import { randomUUID } from 'node:crypto';
import type { ComponentDirectory, IConnector, Table } from '@pointrec/core';
import { RtuMap } from '../address/index.js';
import type { MergedViewCache } from '../cache/index.js';
import {
  cleanAlarmCompare,
  cleanAnalogExport,
  cleanAutoTests,
  cleanCommissioning,
  cleanControlExport,
  cleanInventory,
  cleanMatchCompare,
  cleanPointExport,
  cleanSetpointExport,
} from '../importers/index.js';
import { readTable } from '../io/index.js';
import {
  MergeEngine,
  resolveExceptions,
  type CommissioningTestNames,
  type MergeInputs,
  type ReconExceptions,
} from '../merge/index.js';
import { RuleEngine, type PredicateDefinition, type PredicateSummary } from '../rules/index.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { scopeKey, type ReconScope } from '../types/scope.js';

export type SourceName = keyof MergeInputs;

export const SOURCE_NAMES: readonly SourceName[] = [
  'points',
  'analogs',
  'controls',
  'setpoints',
  'matchCompare',
  'inventory',
  'alarmCompare',
  'autoTests',
  'commissioning',
];

/** One connector per raw extract */
export type SourceConnectors = Record<SourceName, IConnector>;

/** Receives every cleaned table and the merged table, e.g. to dump them for debugging */
export type TableObserver = (name: string, table: Table) => Promise<void>;

export interface ReconciliationRunOptions {
  /** Run id reported in the result (default: a new uuid) */
  id?: string;
  sources: SourceConnectors;
  predicates: PredicateDefinition[];
  /** Omit to run without a cache */
  cache?: MergedViewCache;
  /** Rebuild and rewrite the cached table instead of reading it */
  refreshCache?: boolean;
  allowDuplicateAddresses?: boolean;
  exceptions?: Partial<ReconExceptions>;
  commissioningTests?: CommissioningTestNames;
  directory?: ComponentDirectory;
  onTable?: TableObserver;
  logger?: ReconLogger;
}

export interface RunResult {
  id: string;
  startedAt: Date;
  scope: ReconScope;
  fromCache: boolean;
  /** Merged table plus one column per predicate */
  table: Table;
  summary: PredicateSummary[];
  processingTimeMs: number;
}

export class ReconciliationRun {
  private readonly logger: ReconLogger;
  private readonly exceptions: ReconExceptions;
  private readonly rules: RuleEngine;

  constructor(private readonly options: ReconciliationRunOptions) {
    this.logger = options.logger ?? noopLogger;
    this.exceptions = resolveExceptions(options.exceptions);
    this.rules = new RuleEngine(options.predicates, { logger: this.logger });
  }

  async execute(scope: ReconScope): Promise<RunResult> {
    const startTime = Date.now();
    const startedAt = new Date();
    const { cache } = this.options;

    let merged: Table | null = null;
    if (cache && !this.options.refreshCache) {
      const hit = await cache.read(scope);
      merged = hit?.table ?? null;
    }
    const fromCache = merged !== null;

    if (merged === null) {
      merged = await this.build(scope);
      if (cache) await cache.write(scope, merged);
    }

    this.logger.info(`Evaluating ${this.rules.predicates.length} predicates over ${merged.rows.length} rows`);
    const { table, summary } = this.rules.evaluate(merged);

    return {
      id: this.options.id ?? randomUUID(),
      startedAt,
      scope,
      fromCache,
      table,
      summary,
      processingTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Read, clean and merge every source for `scope`
   */
  async build(scope: ReconScope): Promise<Table> {
    const raw = await this.readSources();
    const logger = this.logger;

    const points = await this.observe('points', cleanPointExport(raw.points, { logger }));
    const analogs = await this.observe('analogs', cleanAnalogExport(raw.analogs, { logger }));
    const controls = await this.observe('controls', cleanControlExport(raw.controls, { logger }));
    const setpoints = await this.observe('setpoints', cleanSetpointExport(raw.setpoints, { logger }));
    const matchCompare = await this.observe('matchCompare', cleanMatchCompare(raw.matchCompare));
    const inventory = await this.observe(
      'inventory',
      cleanInventory(raw.inventory, {
        logger,
        excludedRtus: this.exceptions.excludedInventoryRtus,
        allowDuplicateAddresses: this.options.allowDuplicateAddresses,
      })
    );
    const alarmCompare = await this.observe('alarmCompare', cleanAlarmCompare(raw.alarmCompare));

    const rtuMap = RtuMap.fromPoints({
      columns: points.columns,
      rows: [...points.rows, ...analogs.rows],
    });
    await this.observe('rtuMap', rtuMap.toTable());

    const autoTests = await this.observe('autoTests', cleanAutoTests(raw.autoTests, rtuMap, { logger }));
    const commissioning = await this.observe(
      'commissioning',
      cleanCommissioning(raw.commissioning, rtuMap, { logger })
    );

    const engine = new MergeEngine({
      exceptions: this.exceptions,
      commissioningTests: this.options.commissioningTests,
      directory: this.options.directory,
      logger,
    });
    const merged = await engine.merge(
      { points, analogs, controls, setpoints, matchCompare, inventory, alarmCompare, autoTests, commissioning },
      scope
    );
    return this.observe(`merged-${scopeKey(scope)}`, merged);
  }

  private async readSources(): Promise<MergeInputs> {
    const tables = new Map<SourceName, Table>();
    for (const name of SOURCE_NAMES) {
      const connector = this.options.sources[name];
      const table = await readTable(connector);
      this.logger.info(`Read ${name}: ${table.rows.length} rows`, {
        source: name,
        connector: connector.config.id,
        rows: table.rows.length,
      });
      tables.set(name, table);
    }
    const get = (name: SourceName): Table => tables.get(name) ?? { columns: [], rows: [] };
    return {
      points: get('points'),
      analogs: get('analogs'),
      controls: get('controls'),
      setpoints: get('setpoints'),
      matchCompare: get('matchCompare'),
      inventory: get('inventory'),
      alarmCompare: get('alarmCompare'),
      autoTests: get('autoTests'),
      commissioning: get('commissioning'),
    };
  }

  private async observe(name: string, table: Table): Promise<Table> {
    this.logger.info(`Prepared ${name}: ${table.rows.length} rows`, { table: name, rows: table.rows.length });
    if (this.options.onTable) await this.options.onTable(name, table);
    return table;
  }
}
