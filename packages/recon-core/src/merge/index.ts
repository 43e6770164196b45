export { MergeEngine, type MergeInputs, type MergeOptions } from './merge-engine.js';
export {
  DEFAULT_EXCEPTIONS,
  controlAliasFor,
  pointAliasFor,
  resolveExceptions,
  type AliasSubstitution,
  type ReconExceptions,
} from './exceptions.js';
export { DUMMY_RTU_ID, appendDummyRows, type DummySource } from './dummies.js';
export { COMMON_COLUMNS, REVIEW_COLUMNS, applyScope, excludeRtus, sortByAddress, unionPointTables } from './union.js';
export { assertRowCount, indexBy, leftJoinUnique } from './join.js';
export { ALARM_POINT_COLUMNS, ALARM_SLOT_COUNT, alarmSlotColumns, attachAlarms } from './alarms.js';
export {
  DEFAULT_COMMISSIONING_TESTS,
  MAX_CONTROL_SLOTS,
  attachControls,
  controlColumns,
  type CommissioningTestNames,
} from './controls.js';
export { ALIAS_EXISTS_COLUMN, ALIAS_LINKED_COLUMN, candidateAlias, deriveRowFlags } from './flags.js';
export { parseFlag, percentage } from './values.js';
