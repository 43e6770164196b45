/**
 * Defect predicate AST.
 *
 * A predicate is a tree of groups (and/or) whose leaves are criteria.
 * Each criterion variant carries exactly the operands its operator needs.
 */

/** Literal operand of `==`, `!=` and `in` */
export type Literal = string | number | boolean | null;

export type SingleColumnTest = 'notna' | 'notna_or_blank' | 'isna_or_blank' | 'isnull_or_zero';

export type MultiColumnTest = 'any_notna' | 'all_null' | 'any_zero' | 'no_zeros' | 'no_true_or_one';

export type TripleTest = 'ctrl_test_ok' | 'notinpo_test_ok';

export type CriterionNode =
  | { kind: 'criterion'; op: '==' | '!='; column: string; value: Literal }
  | { kind: 'criterion'; op: 'in'; column: string; values: Literal[] }
  | { kind: 'criterion'; op: 'endswith'; column: string; suffix: string }
  | { kind: 'criterion'; op: SingleColumnTest; column: string }
  | { kind: 'criterion'; op: MultiColumnTest; columns: string[] }
  | { kind: 'criterion'; op: 'notna_pair'; groups: string[][] }
  | { kind: 'criterion'; op: TripleTest; groups: Array<[string, string, string]> }
  | { kind: 'criterion'; op: 'name_without_config'; groups: Array<[string, string]> }
  | { kind: 'criterion'; op: 'always_false' };

export type CombineWith = 'and' | 'or';

export interface GroupNode {
  kind: 'group';
  combineWith: CombineWith;
  children: PredicateNode[];
}

export type PredicateNode = CriterionNode | GroupNode;

export type CriterionOperator = CriterionNode['op'];

export interface PredicateDefinition {
  /** Column written with the result, e.g. `Report3` */
  id: string;
  name: string;
  /** Log the matching row count after each top-level child */
  debug: boolean;
  /** Columns inserted empty (with a warning) when the dataset lacks them */
  requiredColumns: string[];
  root: GroupNode;
}

/**
 * Every column a node reads, in first-use order
 */
export function referencedColumns(node: PredicateNode): string[] {
  const seen = new Set<string>();
  const visit = (current: PredicateNode): void => {
    if (current.kind === 'group') {
      current.children.forEach(visit);
      return;
    }
    for (const column of criterionColumns(current)) {
      seen.add(column);
    }
  };
  visit(node);
  return [...seen];
}

export function criterionColumns(node: CriterionNode): string[] {
  switch (node.op) {
    case '==':
    case '!=':
    case 'in':
    case 'endswith':
    case 'notna':
    case 'notna_or_blank':
    case 'isna_or_blank':
    case 'isnull_or_zero':
      return [node.column];
    case 'any_notna':
    case 'all_null':
    case 'any_zero':
    case 'no_zeros':
    case 'no_true_or_one':
      return node.columns;
    case 'notna_pair':
      return node.groups.flat();
    case 'ctrl_test_ok':
    case 'notinpo_test_ok':
      return node.groups.flat();
    case 'name_without_config':
      return node.groups.flat();
    case 'always_false':
      return [];
    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled criterion: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * One-line rendering for debug traces
 */
export function describeNode(node: PredicateNode): string {
  if (node.kind === 'group') {
    return `(${node.children.map(describeNode).join(` ${node.combineWith} `)})`;
  }
  switch (node.op) {
    case '==':
    case '!=':
      return `${node.column} ${node.op} ${JSON.stringify(node.value)}`;
    case 'in':
      return `${node.column} in ${JSON.stringify(node.values)}`;
    case 'endswith':
      return `${node.column} endswith ${JSON.stringify(node.suffix)}`;
    case 'notna':
    case 'notna_or_blank':
    case 'isna_or_blank':
    case 'isnull_or_zero':
      return `${node.column} ${node.op}`;
    case 'any_notna':
    case 'all_null':
    case 'any_zero':
    case 'no_zeros':
    case 'no_true_or_one':
      return `${node.op}(${node.columns.join(',')})`;
    case 'notna_pair':
    case 'ctrl_test_ok':
    case 'notinpo_test_ok':
    case 'name_without_config': {
      const groups: string[][] = node.groups;
      return `${node.op}(${groups.map((g) => g.join(',')).join('|')})`;
    }
    case 'always_false':
      return 'always_false';
    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled criterion: ${JSON.stringify(exhaustive)}`);
    }
  }
}
