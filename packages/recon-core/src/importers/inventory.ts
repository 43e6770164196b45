/**
 * Cleaner for the control-system (PowerOn) RTU inventory extract.
 *
 * The inventory is the unique-per-address side of every address join, so
 * this is where duplicate addresses are caught.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, isBlank, isMissing, toText } from '@pointrec/core';
import {
  IEC101_PROTOCOL,
  computeInventoryOffset,
  deriveInventoryAddress,
  formatRtuId,
  parseInteger,
  splitIoa,
  stripRtuSuffix,
} from '../address/index.js';
import { ReconError } from '../errors/index.js';
import { DEFAULT_EXCEPTIONS } from '../merge/exceptions.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { sourceLayout } from './source-columns.js';
import { filterRows, joinAlias, renameColumns, requireColumns, selectColumns, withColumns } from './table-ops.js';

export interface InventoryCleanOptions {
  logger?: ReconLogger;
  /** Inventory RTU names (with `_RTU` suffix) to discard */
  excludedRtus?: string[];
  /** Keep the last row per duplicated address instead of failing */
  allowDuplicateAddresses?: boolean;
}

const PO_RENAMES: Record<string, string> = {
  Protocol: 'PO_Protocol',
  Card: 'PO_Card',
  Word: 'PO_Word',
  IOA1: 'PO_IOA1',
  IOA2: 'PO_IOA2',
  Offset: 'PO_Offset',
  GenericType: 'PO_GenericType',
  eTerraAlias: 'PO_eTerraAlias',
};

const INTEGER_TEXT_COLUMNS = ['PO_Card', 'PO_Word', 'Shift', 'Size'];

export function genericTypeFromPoType(poType: CellValue): string {
  switch (poType) {
    case 'A1':
    case 'A2':
    case 'A4':
      return 'A';
    case 'DI':
      return 'SD';
    case 'DD':
      return 'DD';
    case 'DO':
      return 'C';
    case 'AO':
      return 'SETPOINT';
    default:
      return 'Unknown';
  }
}

function splitInventoryIoa(row: Row, logger: ReconLogger): Record<string, CellValue> {
  const ioa = cell(row, 'IOA');
  if (isBlank(ioa)) {
    return { IOA1: null, IOA2: null };
  }
  const value = parseInteger(ioa);
  if (value === null || value < 0 || value > 0xffffffff) {
    logger.warn(
      `IOA is not an integer: r${toText(cell(row, 'RTU')) ?? ''}:c${toText(cell(row, 'Card')) ?? ''}:w${toText(ioa) ?? ''}`
    );
    return { IOA1: null, IOA2: null };
  }
  const [ioa1, ioa2] = splitIoa(value);
  return { IOA1: ioa1, IOA2: ioa2 };
}

function integerText(value: CellValue): CellValue {
  const parsed = parseInteger(value);
  return parsed === null ? value : String(parsed);
}

function describeRow(row: Row): Record<string, CellValue> {
  return {
    GenericPointAddress: cell(row, 'GenericPointAddress'),
    PO_RTU: cell(row, 'PO_RTU'),
    PO_Card: cell(row, 'PO_Card'),
    PO_Word: cell(row, 'PO_Word'),
    POType: cell(row, 'POType'),
  };
}

function compareText(a: CellValue, b: CellValue): number {
  const left = toText(a) ?? '';
  const right = toText(b) ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Within each group of IEC input rows sharing RTU/card/word, keep the row
 * that sorts last by POType (the digital over the analog).
 */
function dropIecDuplicates(rows: Row[], logger: ReconLogger): Row[] {
  const groups = new Map<string, number[]>();
  rows.forEach((row, index) => {
    if (cell(row, 'PO_Protocol') !== IEC101_PROTOCOL || cell(row, 'PO_GenericType') === 'C') return;
    const key = JSON.stringify([cell(row, 'PO_RTU'), cell(row, 'PO_Card'), cell(row, 'PO_Word')]);
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  const dropped = new Set<number>();
  for (const indices of groups.values()) {
    if (indices.length < 2) continue;
    const sorted = [...indices].sort((a, b) => compareText(cell(rows[a] ?? {}, 'POType'), cell(rows[b] ?? {}, 'POType')));
    for (const index of sorted.slice(0, -1)) {
      dropped.add(index);
      logger.warn('Dropping duplicate IEC inventory row', { row: describeRow(rows[index] ?? {}) });
    }
  }

  return rows.filter((_, index) => !dropped.has(index));
}

function resolveDuplicateAddresses(rows: Row[], allow: boolean, logger: ReconLogger): Row[] {
  const byAddress = new Map<string, number[]>();
  rows.forEach((row, index) => {
    const address = toText(cell(row, 'GenericPointAddress'));
    if (address === null) return;
    const indices = byAddress.get(address);
    if (indices) {
      indices.push(index);
    } else {
      byAddress.set(address, [index]);
    }
  });

  const duplicates = [...byAddress.entries()].filter(([, indices]) => indices.length > 1);
  if (duplicates.length === 0) {
    return rows;
  }

  const offending = duplicates.flatMap(([, indices]) => indices.map((i) => describeRow(rows[i] ?? {})));
  if (!allow) {
    throw new ReconError({
      code: 'DUPLICATE_ADDRESS',
      message: `${duplicates.length} GenericPointAddress value(s) appear more than once in the inventory`,
      suggestion:
        'Resolve the duplicates in the inventory extract, or rerun with --allow-duplicate-addresses to keep the last row per address.',
      context: {
        addresses: duplicates.map(([address, indices]) => ({ address, count: indices.length })),
        rows: offending,
      },
    });
  }

  const dropped = new Set<number>();
  for (const [address, indices] of duplicates) {
    for (const index of indices.slice(0, -1)) {
      dropped.add(index);
    }
    logger.warn(`Keeping the last of ${indices.length} inventory rows for ${address}`);
  }
  return rows.filter((_, index) => !dropped.has(index));
}

export function cleanInventory(raw: Table, options: InventoryCleanOptions = {}): Table {
  const logger = options.logger ?? noopLogger;
  const excluded = new Set(options.excludedRtus ?? DEFAULT_EXCEPTIONS.excludedInventoryRtus);
  const layout = sourceLayout('inventory');

  let table = renameColumns(raw, layout.renames);
  requireColumns(table, layout.required, 'Inventory extract');

  table = withColumns(table, ['GenericType', 'RTU', 'RTUId', 'eTerraAlias', 'CASDU', 'IOA'], (row) => {
    const poRtu = toText(cell(row, 'PO_RTU'));
    const rtu = poRtu === null ? null : stripRtuSuffix(poRtu);
    return {
      GenericType: genericTypeFromPoType(cell(row, 'POType')),
      RTU: rtu,
      RTUId: rtu === null ? null : formatRtuId(rtu, cell(row, 'RTUAddress')),
      eTerraAlias: joinAlias(row),
      CASDU: cell(row, 'Card'),
      IOA: cell(row, 'Word'),
    };
  });
  table = withColumns(table, ['IOA1', 'IOA2', 'Offset'], (row) => ({
    ...splitInventoryIoa(row, logger),
    Offset: computeInventoryOffset(row, logger),
  }));
  table = withColumns(table, ['GenericPointAddress'], (row) => ({
    GenericPointAddress: deriveInventoryAddress(row),
  }));
  table = renameColumns(table, PO_RENAMES);
  table = withColumns(table, INTEGER_TEXT_COLUMNS, (row) => {
    const out: Record<string, CellValue> = {};
    for (const column of INTEGER_TEXT_COLUMNS) {
      out[column] = integerText(cell(row, column));
    }
    return out;
  });
  table = selectColumns(table, layout.keep);

  const beforeExclusion = table.rows.length;
  table = filterRows(table, (row) => {
    const rtu = cell(row, 'PO_RTU');
    return isMissing(rtu) || !excluded.has(String(rtu));
  });
  if (table.rows.length < beforeExclusion) {
    logger.info(`Excluded ${beforeExclusion - table.rows.length} inventory row(s) on excluded RTUs`);
  }

  const deduplicated = dropIecDuplicates(table.rows, logger);
  const rows = resolveDuplicateAddresses(deduplicated, options.allowDuplicateAddresses ?? false, logger);
  return { columns: table.columns, rows };
}
