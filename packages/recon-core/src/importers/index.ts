export * from './eterra.js';
export * from './inventory.js';
export * from './compare-reports.js';
export * from './test-records.js';
export { renameColumns, requireColumns, selectColumns, withColumns, filterRows, joinAlias } from './table-ops.js';
export { sourceLayout, type SourceKind, type SourceLayout } from './source-columns.js';
