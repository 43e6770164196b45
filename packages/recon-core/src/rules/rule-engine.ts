/**
 * Rule Engine
 *
 * Evaluates a predicate library over the merged table. Every predicate
 * appends one boolean column named after its id; a predicate may read the
 * columns of other predicates, so the library runs in dependency order.
 */

import type { Row, Table } from '@pointrec/core';
import { ReconError } from '../errors/index.js';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import { describeNode, referencedColumns, type PredicateDefinition } from './ast.js';
import { evaluateGroup, evaluateNode } from './evaluator.js';

export interface RuleEngineOptions {
  logger?: ReconLogger;
}

export interface PredicateSummary {
  id: string;
  name: string;
  /** Rows for which the predicate is true */
  count: number;
}

export interface RuleEvaluation {
  table: Table;
  summary: PredicateSummary[];
}

/**
 * Order predicates so each one runs after the predicates it reads.
 * Independent predicates keep their library order.
 * @throws ReconError PREDICATE_CYCLE
 */
export function orderPredicates(predicates: PredicateDefinition[]): PredicateDefinition[] {
  const byId = new Map(predicates.map((predicate) => [predicate.id, predicate]));
  const state = new Map<string, 'visiting' | 'done'>();
  const ordered: PredicateDefinition[] = [];

  const visit = (predicate: PredicateDefinition, path: string[]): void => {
    const current = state.get(predicate.id);
    if (current === 'done') return;
    if (current === 'visiting') {
      const cycle = [...path.slice(path.indexOf(predicate.id)), predicate.id];
      throw new ReconError({
        code: 'PREDICATE_CYCLE',
        message: `Predicates reference each other in a cycle: ${cycle.join(' -> ')}`,
        suggestion: 'Remove one of the references so the predicates can be ordered.',
        context: { cycle },
      });
    }

    state.set(predicate.id, 'visiting');
    for (const column of referencedColumns(predicate.root)) {
      const dependency = byId.get(column);
      if (dependency) visit(dependency, [...path, predicate.id]);
    }
    state.set(predicate.id, 'done');
    ordered.push(predicate);
  };

  for (const predicate of predicates) {
    visit(predicate, []);
  }
  return ordered;
}

export class RuleEngine {
  private readonly ordered: PredicateDefinition[];
  private readonly logger: ReconLogger;

  constructor(predicates: PredicateDefinition[], options: RuleEngineOptions = {}) {
    this.ordered = orderPredicates(predicates);
    this.logger = options.logger ?? noopLogger;
  }

  /** Predicates in evaluation order */
  get predicates(): readonly PredicateDefinition[] {
    return this.ordered;
  }

  /**
   * Append one column per predicate. The input table is left untouched.
   * @throws ReconError UNKNOWN_COLUMN when a predicate reads an undefined column
   */
  evaluate(table: Table): RuleEvaluation {
    const columns = [...table.columns];
    const present = new Set(columns);
    const rows: Row[] = table.rows.map((row) => ({ ...row }));
    const summary: PredicateSummary[] = [];

    for (const predicate of this.ordered) {
      for (const column of predicate.requiredColumns) {
        if (present.has(column)) continue;
        this.logger.warn(`${predicate.id}: column "${column}" is missing; using an empty column`, {
          predicate: predicate.id,
          column,
        });
        columns.push(column);
        present.add(column);
        for (const row of rows) {
          row[column] = '';
        }
      }

      const unknown = referencedColumns(predicate.root).filter((column) => !present.has(column));
      if (unknown.length > 0) {
        throw new ReconError({
          code: 'UNKNOWN_COLUMN',
          message: `${predicate.id} reads undefined column(s): ${unknown.join(', ')}`,
          suggestion: `Add the column(s) to the data or to requiredColumns of ${predicate.id}.`,
          context: { predicate: predicate.id, columns: unknown },
        });
      }

      if (predicate.debug) this.trace(predicate, rows);

      let count = 0;
      for (const row of rows) {
        const matched = evaluateGroup(predicate.root, row);
        row[predicate.id] = matched;
        if (matched) count += 1;
      }
      if (!present.has(predicate.id)) {
        columns.push(predicate.id);
        present.add(predicate.id);
      }

      this.logger.info(`${predicate.id}: ${count} matching rows (${predicate.name})`, {
        predicate: predicate.id,
        count,
      });
      summary.push({ id: predicate.id, name: predicate.name, count });
    }

    return { table: { columns, rows }, summary };
  }

  /**
   * Log how many rows still match after each top-level child is folded in
   */
  private trace(predicate: PredicateDefinition, rows: Row[]): void {
    const { combineWith, children } = predicate.root;
    let running = rows.map(() => combineWith === 'and');
    children.forEach((child, index) => {
      running = running.map((value, rowIndex) => {
        const row = rows[rowIndex];
        const result = evaluateNode(child, row);
        return combineWith === 'and' ? value && result : value || result;
      });
      const matching = running.filter(Boolean).length;
      this.logger.debug(`${predicate.id} step ${index + 1}: ${describeNode(child)} -> ${matching} rows`, {
        predicate: predicate.id,
        step: index + 1,
        matching,
      });
    });
  }
}
