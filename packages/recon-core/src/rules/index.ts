export * from './ast.js';
export * from './parser.js';
export * from './evaluator.js';
export * from './library.js';
export * from './rule-engine.js';
