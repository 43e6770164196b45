/**
 * @pointrec/connector-file
 *
 * File-based connectors for CSV, Excel, and JSON files
 */

export { BaseFileConnector } from './base-file-connector.js';
export type { FileConnectorConfig } from './base-file-connector.js';

export { CsvConnector, createCsvConnector } from './csv-connector.js';
export type { CsvConnectorConfig } from './csv-connector.js';

export { JsonConnector, createJsonConnector } from './json-connector.js';
export type { JsonConnectorConfig } from './json-connector.js';

export { ExcelConnector, createExcelConnector, normalizeExcelValue } from './excel-connector.js';
export type { ExcelConnectorConfig } from './excel-connector.js';

export { fillWorksheet, uniqueSheetName, writeExcelWorkbook } from './excel-workbook.js';
export type { SheetLayout, WorkbookSheet } from './excel-workbook.js';
