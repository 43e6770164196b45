/**
 * Whole-table reads and writes through a connector
 */

import type { IConnector, Table } from '@pointrec/core';

/**
 * Open the store, read every row and close it again
 */
export async function readTable(connector: IConnector): Promise<Table> {
  await connector.connect();
  try {
    return await connector.readRows();
  } finally {
    await connector.disconnect();
  }
}

/**
 * Open the store, replace its content with `table` and close it again
 */
export async function writeTable(connector: IConnector, table: Table): Promise<number> {
  await connector.connect();
  try {
    const result = await connector.replaceRows(table);
    return result.success;
  } finally {
    await connector.disconnect();
  }
}
