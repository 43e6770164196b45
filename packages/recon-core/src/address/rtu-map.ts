/**
 * RTU lookup built from the engineering point export.
 * The control-system tables name RTUs with an `_RTU` suffix and carry no
 * address or protocol of their own for test records.
 */

import type { CellValue, Row, Table } from '@pointrec/core';
import { cell, toText } from '@pointrec/core';

export interface RtuEntry {
  rtu: string;
  rtuAddress: CellValue;
  protocol: CellValue;
}

export interface ResolvedRtu {
  rtuAddress: CellValue;
  protocol: CellValue;
}

export function stripRtuSuffix(name: string): string {
  return name.replace(/_RTU/g, '');
}

export class RtuMap {
  private readonly byName = new Map<string, RtuEntry>();
  private readonly entryList: RtuEntry[] = [];

  constructor(entries: Iterable<RtuEntry> = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  /**
   * Distinct `(RTU, RTUAddress, Protocol)` triples of a cleaned point table.
   * The first triple seen for a name wins lookups.
   */
  static fromPoints(points: Table): RtuMap {
    const seen = new Set<string>();
    const entries: RtuEntry[] = [];
    for (const row of points.rows) {
      const rtu = toText(cell(row, 'RTU'));
      if (rtu === null) continue;
      const entry: RtuEntry = {
        rtu,
        rtuAddress: cell(row, 'RTUAddress'),
        protocol: cell(row, 'Protocol'),
      };
      const key = JSON.stringify([entry.rtu, entry.rtuAddress, entry.protocol]);
      if (seen.has(key)) continue;
      seen.add(key);
      entries.push(entry);
    }
    return new RtuMap(entries);
  }

  private add(entry: RtuEntry): void {
    this.entryList.push(entry);
    if (!this.byName.has(entry.rtu)) {
      this.byName.set(entry.rtu, entry);
    }
  }

  get entries(): readonly RtuEntry[] {
    return this.entryList;
  }

  /**
   * Address and protocol for a control-system RTU name, or a null pair when unknown
   */
  resolve(poRtuName: CellValue): ResolvedRtu {
    const name = toText(poRtuName);
    const entry = name === null ? undefined : this.byName.get(stripRtuSuffix(name));
    if (!entry) {
      return { rtuAddress: null, protocol: null };
    }
    return { rtuAddress: entry.rtuAddress, protocol: entry.protocol };
  }

  toTable(): Table {
    const rows: Row[] = this.entryList.map((e) => ({
      RTU: e.rtu,
      RTUAddress: e.rtuAddress,
      Protocol: e.protocol,
    }));
    return { columns: ['RTU', 'RTUAddress', 'Protocol'], rows };
  }
}
