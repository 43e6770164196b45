export * from './connector.js';
export * from './component-directory.js';
