/**
 * Row-wise evaluation of the predicate AST.
 *
 * Null semantics:
 * - `==` never matches a null cell, and `!=` is its negation (so a null
 *   cell is `!=` everything).
 * - Numbers and booleans compare numerically (`true == 1`); a string only
 *   equals the identical string.
 */

import type { CellValue, Row } from '@pointrec/core';
import { cell } from '@pointrec/core';
import type { CriterionNode, GroupNode, Literal, PredicateNode } from './ast.js';

export function looseEquals(value: CellValue, literal: Literal): boolean {
  if (value === null || literal === null) return false;
  if (typeof value === 'string' || typeof literal === 'string') return value === literal;
  return Number(value) === Number(literal);
}

function isIn(value: CellValue, values: Literal[]): boolean {
  if (value === null) return values.includes(null);
  return values.some((literal) => looseEquals(value, literal));
}

const notNull = (value: CellValue): boolean => value !== null;

const isZero = (value: CellValue): boolean => looseEquals(value, 0);

export function evaluateCriterion(node: CriterionNode, row: Row): boolean {
  switch (node.op) {
    case '==':
      return looseEquals(cell(row, node.column), node.value);
    case '!=':
      return !looseEquals(cell(row, node.column), node.value);
    case 'in':
      return isIn(cell(row, node.column), node.values);
    case 'endswith': {
      const value = cell(row, node.column);
      return typeof value === 'string' && value.endsWith(node.suffix);
    }
    case 'notna':
      return notNull(cell(row, node.column));
    case 'notna_or_blank': {
      const value = cell(row, node.column);
      return value !== null && value !== '';
    }
    case 'isna_or_blank': {
      const value = cell(row, node.column);
      return value === null || value === '';
    }
    case 'isnull_or_zero': {
      const value = cell(row, node.column);
      return value === null || isZero(value);
    }
    case 'any_notna':
      return node.columns.some((column) => notNull(cell(row, column)));
    case 'all_null':
      return node.columns.every((column) => !notNull(cell(row, column)));
    case 'any_zero':
      return node.columns.some((column) => isZero(cell(row, column)));
    case 'no_zeros':
      return node.columns.every((column) => !isZero(cell(row, column)));
    case 'no_true_or_one':
      // true == 1, so one comparison covers both
      return node.columns.every((column) => !looseEquals(cell(row, column), 1));
    case 'notna_pair':
      return node.groups.every((group) => group.every((column) => notNull(cell(row, column))));
    case 'ctrl_test_ok':
      return node.groups.every(
        ([address, health, result]) =>
          notNull(cell(row, address)) &&
          looseEquals(cell(row, health), 'GOOD') &&
          looseEquals(cell(row, result), 'OK')
      );
    case 'notinpo_test_ok':
      return node.groups.every(
        ([address, status, result]) =>
          notNull(cell(row, address)) &&
          !looseEquals(cell(row, status), 'OK') &&
          !looseEquals(cell(row, result), 'OK')
      );
    case 'name_without_config':
      return node.groups.every(([name, config]) => {
        const health = cell(row, config);
        return notNull(cell(row, name)) && (health === null || !looseEquals(health, 'GOOD'));
      });
    case 'always_false':
      return false;
    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled criterion: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export function evaluateGroup(group: GroupNode, row: Row): boolean {
  let result = group.combineWith === 'and';
  for (const child of group.children) {
    const value = evaluateNode(child, row);
    result = group.combineWith === 'and' ? result && value : result || value;
  }
  return result;
}

export function evaluateNode(node: PredicateNode, row: Row): boolean {
  return node.kind === 'group' ? evaluateGroup(node, row) : evaluateCriterion(node, row);
}
