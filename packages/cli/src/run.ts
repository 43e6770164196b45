/**
 * One CLI invocation: wire the connectors from the config, execute the
 * reconciliation and write the defect workbook.
 */

import { join, resolve } from 'node:path';
import {
  MergedViewCache,
  ReconciliationRun,
  loadPredicateLibrary,
  type ReconLogger,
  type RunResult,
} from '@pointrec/recon-core';
import type { CliOptions } from './args.js';
import type { ConfigFile } from './config.js';
import { createDebugDump } from './debug-dump.js';
import { defectReportPath, writeDefectReport } from './report-writer.js';
import { carryForwardReviews, readPreviousReport } from './review-carry-forward.js';
import { buildSourceConnectors, createCacheStoreFactory, createComponentDirectory } from './sources.js';

export interface RunContext {
  runId?: string;
  options: CliOptions;
  config: ConfigFile;
  logger: ReconLogger;
}

export interface RunOutcome {
  result: RunResult;
  reportPath: string;
}

export async function runReconciliation({ runId, options, config, logger }: RunContext): Promise<RunOutcome> {
  const { paths } = config;
  const dataDir = resolve(options.dataDir ?? paths.dataDir);
  const libraryPath = config.rules?.libraryPath;
  const predicates = loadPredicateLibrary(libraryPath === undefined ? undefined : resolve(libraryPath));
  logger.info(`Loaded ${predicates.length} predicates`, { libraryPath: libraryPath ?? 'default' });

  const directory = config.targetSystem ? createComponentDirectory(config.targetSystem) : undefined;
  if (directory) await directory.connect();

  try {
    const cache = options.useCache
      ? new MergedViewCache(createCacheStoreFactory(resolve(paths.cacheDir ?? join(paths.outputDir, 'cache'))), {
          logger,
        })
      : undefined;

    const run = new ReconciliationRun({
      id: runId,
      sources: buildSourceConnectors(config, dataDir),
      predicates,
      cache,
      refreshCache: options.refreshCache,
      allowDuplicateAddresses: options.allowDuplicateAddresses,
      exceptions: config.exceptions,
      commissioningTests: config.commissioningTests,
      directory,
      onTable: paths.debugDir ? createDebugDump(resolve(paths.debugDir), logger) : undefined,
      logger,
    });
    const result = await run.execute(options.scope);

    let points = result.table;
    if (options.previousReport) {
      const previous = await readPreviousReport(resolve(options.previousReport));
      points = carryForwardReviews(points, previous, options.matchBy, logger).table;
    }

    const reportPath = defectReportPath(resolve(paths.outputDir), options.scope);
    await writeDefectReport(reportPath, { points, summary: result.summary }, logger);
    return { result, reportPath };
  } finally {
    if (directory) await directory.disconnect();
  }
}
