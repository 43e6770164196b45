export { readTable, writeTable } from './connector-io.js';
