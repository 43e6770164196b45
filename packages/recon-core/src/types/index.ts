export { noopLogger, type ReconLogger } from './logger.js';
export { ALL_SCOPE, scopeColumn, scopeKey, type ReconScope } from './scope.js';
