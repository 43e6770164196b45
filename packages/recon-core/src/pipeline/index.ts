export * from './reconciliation-run.js';
