/**
 * Run Summary Formatter
 *
 * Plain-text summary printed at the end of a run.
 */

import type { RunResult } from '../pipeline/index.js';
import { scopeKey } from '../types/scope.js';

/**
 * Format a run result as plain text
 */
export function formatRunSummary(result: RunResult): string {
  const lines: string[] = [];
  const idWidth = Math.max(2, ...result.summary.map((entry) => entry.id.length));
  const countWidth = Math.max(1, ...result.summary.map((entry) => String(entry.count).length));

  lines.push(`## Defect Summary`);
  lines.push(`Scope: ${scopeKey(result.scope)}`);
  lines.push(`Started: ${result.startedAt.toISOString()}`);
  lines.push(`Rows: ${result.table.rows.length}${result.fromCache ? ' (from cache)' : ''}`);
  lines.push('');

  for (const entry of result.summary) {
    lines.push(`- ${entry.id.padEnd(idWidth)}  ${String(entry.count).padStart(countWidth)}  ${entry.name}`);
  }
  if (result.summary.length === 0) {
    lines.push('- no predicates evaluated');
  }
  lines.push('');

  lines.push(`---`);
  lines.push(`Processing time: ${result.processingTimeMs}ms`);

  return lines.join('\n');
}
