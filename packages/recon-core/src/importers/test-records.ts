/**
 * Cleaners for control test evidence: the automated control test report
 * and the manual commissioning database.
 *
 * Both record a control as `card:word:ctrlId` against a control-system RTU
 * name, so the address is rebuilt through the RTU map.
 */

import type { CellValue, Table } from '@pointrec/core';
import { cell, isMissing, toText } from '@pointrec/core';
import { formatGenericPointAddress, stripRtuSuffix, type RtuMap } from '../address/index.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { sourceLayout } from './source-columns.js';
import { renameColumns, requireColumns, selectColumns, withColumns } from './table-ops.js';

export interface TestRecordOptions {
  logger?: ReconLogger;
}

/**
 * `[(RTU:RTUAddress):card:word-ctrlId C]` for a tested control, or `null`
 * when the RTU is unknown or the address is not `card:word:ctrlId`.
 */
export function deriveTestedControlAddress(
  rtuName: CellValue,
  controlAddress: CellValue,
  rtuMap: RtuMap,
  logger: ReconLogger = noopLogger
): string | null {
  const name = toText(rtuName);
  const address = toText(controlAddress);
  if (name === null || address === null) return null;

  const parts = address.split(':');
  if (parts.length < 3) {
    logger.warn(`Control address is not card:word:ctrlId: ${address} (${name})`);
    return null;
  }
  const [card = '', word = '', ctrlId = ''] = parts;

  const { rtuAddress } = rtuMap.resolve(name);
  if (isMissing(rtuAddress)) {
    logger.debug(`No RTU address known for ${name}`);
    return null;
  }

  return formatGenericPointAddress({
    rtu: stripRtuSuffix(name),
    rtuAddress: toText(rtuAddress) ?? '',
    key1: card,
    key2: word,
    ctrlTag: ctrlId,
    typeTag: 'C',
  });
}

export function cleanAutoTests(raw: Table, rtuMap: RtuMap, options: TestRecordOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  const layout = sourceLayout('autoTests');
  let table = renameColumns(raw, layout.renames);
  requireColumns(table, layout.required, 'Automated control test report');

  table = withColumns(table, ['GenericPointAddress'], (row) => ({
    GenericPointAddress: deriveTestedControlAddress(cell(row, 'RTU'), cell(row, 'AutoTestAddress'), rtuMap, logger),
  }));
  return selectColumns(table, layout.keep);
}

/** Rows of the `test_results` table */
export function cleanCommissioning(raw: Table, rtuMap: RtuMap, options: TestRecordOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  const layout = sourceLayout('commissioning');
  let table = renameColumns(raw, layout.renames);
  requireColumns(table, layout.required, 'Manual commissioning results');

  table = withColumns(table, ['GenericPointAddress'], (row) => ({
    GenericPointAddress: deriveTestedControlAddress(
      cell(row, 'CommissioningRTUname'),
      cell(row, 'CommissioningControlAddress'),
      rtuMap,
      logger
    ),
  }));
  return selectColumns(table, layout.keep);
}
