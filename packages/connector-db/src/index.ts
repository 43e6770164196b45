/**
 * @pointrec/connector-db
 *
 * Read-only database access: test result tables and the target system's component catalog
 */

export * from './postgresql/index.js';
