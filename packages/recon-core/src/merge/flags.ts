/**
 * Stage 7: row-level flags read by the defect rules
 */

import type { CellValue, ComponentDirectory, Row, Table } from '@pointrec/core';
import { cell, isBlank, toText, unionColumns } from '@pointrec/core';
import { parseInteger } from '../address/index.js';
import { DUMMY_RTU_ID } from './dummies.js';
import { parseFlag } from './values.js';

export const ALIAS_EXISTS_COLUMN = 'PowerOn Alias Exists';
export const ALIAS_LINKED_COLUMN = 'PowerOn Alias Linked to SCADA';

const IGNORE_COLUMNS = ['IGNORE_RTU', 'IGNORE_POINT', 'OLD_DATA'];

const FLAG_COLUMNS = [
  'Type',
  ...IGNORE_COLUMNS,
  'Ignore',
  'RTUComms',
  ALIAS_EXISTS_COLUMN,
  ALIAS_LINKED_COLUMN,
];

/**
 * Alias to look up in the control system: the reviewed alias, else the
 * inventory alias at this address, else the engineering alias
 */
export function candidateAlias(row: Row): string | null {
  for (const column of ['PowerOn Alias', 'POAlias', 'eTerraAlias']) {
    const value = cell(row, column);
    if (!isBlank(value)) return toText(value);
  }
  return null;
}

function existingLinkage(value: CellValue): CellValue {
  const parsed = parseInteger(value);
  return parsed === null ? value : parsed;
}

export async function deriveRowFlags(table: Table, directory?: ComponentDirectory): Promise<Table> {
  let known: Set<string> | null = null;
  if (directory) {
    const candidates = new Set<string>();
    for (const row of table.rows) {
      const existing = parseFlag(cell(row, ALIAS_EXISTS_COLUMN));
      const alias = candidateAlias(row);
      if (existing === null && alias !== null) candidates.add(alias);
    }
    known = await directory.findExistingAliases([...candidates]);
  }

  const rows = table.rows.map((row) => {
    const out: Row = { ...row };
    out.Type = cell(row, 'RTUId') === DUMMY_RTU_ID ? 'DUMMY' : cell(row, 'GenericType');

    let ignore = false;
    for (const column of IGNORE_COLUMNS) {
      const flag = parseFlag(cell(row, column)) ?? false;
      out[column] = flag;
      ignore = ignore || flag;
    }
    out.Ignore = ignore;
    out.RTUComms = cell(row, 'DeviceType') === 'RTU';

    const configured = !isBlank(cell(row, 'POAlias'));
    let exists = parseFlag(cell(row, ALIAS_EXISTS_COLUMN));
    if (exists === null) {
      const alias = candidateAlias(row);
      exists = known ? alias !== null && known.has(alias) : configured;
    }
    out[ALIAS_EXISTS_COLUMN] = exists;

    const linked = cell(row, ALIAS_LINKED_COLUMN);
    out[ALIAS_LINKED_COLUMN] = isBlank(linked)
      ? exists && configured ? 2 : exists ? 1 : 0
      : existingLinkage(linked);
    return out;
  });

  return { columns: unionColumns(table.columns, FLAG_COLUMNS), rows };
}
