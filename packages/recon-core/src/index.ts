/**
 * @pointrec/recon-core
 *
 * Address codec, source importers, merge engine and defect rule engine
 */

export * from './errors/index.js';
export * from './types/index.js';
export * from './address/index.js';
export * from './importers/index.js';
export * from './merge/index.js';
export * from './rules/index.js';
export * from './io/index.js';
export * from './cache/index.js';
export * from './pipeline/index.js';
export * from './formatters/index.js';
