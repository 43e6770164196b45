export { formatRunSummary } from './summary-formatter.js';
