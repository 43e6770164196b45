/**
 * @pointrec/cli
 *
 * Config loading, logging and report output around the reconciliation run
 */

export * from './args.js';
export * from './config.js';
export * from './logger.js';
export * from './sources.js';
export * from './debug-dump.js';
export * from './report-writer.js';
export * from './review-carry-forward.js';
export * from './run.js';
