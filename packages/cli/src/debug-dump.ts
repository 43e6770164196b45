import { join } from 'node:path';
import { createCsvConnector } from '@pointrec/connector-file';
import { noopLogger, writeTable, type ReconLogger, type TableObserver } from '@pointrec/recon-core';

/**
 * Observer that writes every intermediate table to `<debugDir>/<name>.csv`
 */
export function createDebugDump(debugDir: string, logger: ReconLogger = noopLogger): TableObserver {
  return async (name, table) => {
    const filePath = join(debugDir, `${name}.csv`);
    await writeTable(createCsvConnector({ id: `debug-${name}`, name, filePath, createIfMissing: true }), table);
    logger.debug(`Dumped ${name} to ${filePath}`, { table: name, rows: table.rows.length });
  };
}
