/**
 * Parse predicate definitions from their JSON form into the AST.
 *
 * JSON form:
 *   { "id": "Report1", "name": "...", "requiredColumns": [...],
 *     "and": [ { "column": "GenericType", "op": "==", "value": "A" },
 *              { "or": [ ... ] } ] }
 */

import { z } from 'zod';
import { ReconError } from '../errors/index.js';
import type {
  CombineWith,
  CriterionNode,
  GroupNode,
  Literal,
  PredicateDefinition,
  PredicateNode,
} from './ast.js';

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const rawCriterionSchema = z
  .object({
    op: z.string().min(1),
    column: z.string().min(1).optional(),
    columns: z.array(z.string().min(1)).optional(),
    groups: z.array(z.array(z.string().min(1))).optional(),
    value: z.union([literalSchema, z.array(literalSchema)]).optional(),
  })
  .strict();

type RawCriterion = z.infer<typeof rawCriterionSchema>;
type RawNode = RawCriterion | { and: RawNode[] } | { or: RawNode[] };

const rawNodeSchema: z.ZodType<RawNode> = z.lazy(() =>
  z.union([
    rawCriterionSchema,
    z.object({ and: z.array(rawNodeSchema) }).strict(),
    z.object({ or: z.array(rawNodeSchema) }).strict(),
  ])
);

const rawPredicateSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    debug: z.boolean().optional(),
    requiredColumns: z.array(z.string().min(1)).optional(),
    and: z.array(rawNodeSchema).optional(),
    or: z.array(rawNodeSchema).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if ((value.and === undefined) === (value.or === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'exactly one of "and" or "or" is required',
      });
    }
  });

export const predicateLibrarySchema = z
  .object({
    predicates: z.array(rawPredicateSchema),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.predicates.forEach((predicate, index) => {
      if (seen.has(predicate.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['predicates', index, 'id'],
          message: `Duplicate predicate id: ${predicate.id}`,
        });
      }
      seen.add(predicate.id);
    });
  });

const OPERATOR_ALIASES = new Map<string, string>([['paired_notna', 'notna_pair']]);

function invalid(predicateId: string, message: string, context: Record<string, unknown> = {}): ReconError {
  return new ReconError({
    code: 'INVALID_PREDICATE',
    message: `Predicate ${predicateId}: ${message}`,
    suggestion: 'Fix the predicate definition in the rule library.',
    context: { predicateId, ...context },
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `- ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

class CriterionBuilder {
  constructor(
    private readonly predicateId: string,
    private readonly raw: RawCriterion
  ) {}

  column(): string {
    if (this.raw.column === undefined) {
      throw invalid(this.predicateId, `operator "${this.raw.op}" needs "column"`, { criterion: this.raw });
    }
    return this.raw.column;
  }

  columns(): string[] {
    if (this.raw.columns === undefined || this.raw.columns.length === 0) {
      throw invalid(this.predicateId, `operator "${this.raw.op}" needs a non-empty "columns" list`, {
        criterion: this.raw,
      });
    }
    return this.raw.columns;
  }

  groups(arity?: number): string[][] {
    const groups = this.raw.groups;
    if (groups === undefined || groups.length === 0) {
      throw invalid(this.predicateId, `operator "${this.raw.op}" needs a non-empty "groups" list`, {
        criterion: this.raw,
      });
    }
    for (const group of groups) {
      const ok = arity === undefined ? group.length > 0 : group.length === arity;
      if (!ok) {
        throw invalid(
          this.predicateId,
          `operator "${this.raw.op}" takes groups of ${arity ?? 'at least 1'} column(s), got [${group.join(',')}]`,
          { criterion: this.raw }
        );
      }
    }
    return groups;
  }

  scalar(): Literal {
    const value = this.raw.value;
    if (value === undefined || Array.isArray(value)) {
      throw invalid(this.predicateId, `operator "${this.raw.op}" needs a scalar "value"`, { criterion: this.raw });
    }
    return value;
  }

  list(): Literal[] {
    const value = this.raw.value;
    if (!Array.isArray(value)) {
      throw invalid(this.predicateId, `operator "${this.raw.op}" needs a list "value"`, { criterion: this.raw });
    }
    return value;
  }

  text(): string {
    const value = this.scalar();
    if (typeof value !== 'string') {
      throw invalid(this.predicateId, `operator "${this.raw.op}" needs a string "value"`, { criterion: this.raw });
    }
    return value;
  }
}

function triples(groups: string[][]): Array<[string, string, string]> {
  return groups.map(([a = '', b = '', c = '']) => [a, b, c]);
}

function pairs(groups: string[][]): Array<[string, string]> {
  return groups.map(([a = '', b = '']) => [a, b]);
}

function buildCriterion(predicateId: string, raw: RawCriterion): CriterionNode {
  const b = new CriterionBuilder(predicateId, raw);
  const op = OPERATOR_ALIASES.get(raw.op) ?? raw.op;

  switch (op) {
    case '==':
    case '!=':
      return { kind: 'criterion', op, column: b.column(), value: b.scalar() };
    case 'in':
      return { kind: 'criterion', op, column: b.column(), values: b.list() };
    case 'endswith':
      return { kind: 'criterion', op, column: b.column(), suffix: b.text() };
    case 'notna':
    case 'notna_or_blank':
    case 'isna_or_blank':
    case 'isnull_or_zero':
      return { kind: 'criterion', op, column: b.column() };
    case 'any_notna':
    case 'all_null':
    case 'any_zero':
    case 'no_zeros':
    case 'no_true_or_one':
      return { kind: 'criterion', op, columns: b.columns() };
    case 'notna_pair':
      return { kind: 'criterion', op, groups: b.groups() };
    case 'ctrl_test_ok':
    case 'notinpo_test_ok':
      return { kind: 'criterion', op, groups: triples(b.groups(3)) };
    case 'name_without_config':
      return { kind: 'criterion', op, groups: pairs(b.groups(2)) };
    case 'always_false':
      return { kind: 'criterion', op };
    default:
      throw new ReconError({
        code: 'UNKNOWN_OPERATOR',
        message: `Predicate ${predicateId}: unknown operator "${raw.op}"`,
        suggestion: 'Use one of the documented operators (==, !=, in, endswith, notna, ...).',
        context: { predicateId, criterion: raw },
      });
  }
}

function buildGroup(predicateId: string, combineWith: CombineWith, children: RawNode[]): GroupNode {
  return {
    kind: 'group',
    combineWith,
    children: children.map((child) => buildNode(predicateId, child)),
  };
}

function buildNode(predicateId: string, raw: RawNode): PredicateNode {
  if ('and' in raw) return buildGroup(predicateId, 'and', raw.and);
  if ('or' in raw) return buildGroup(predicateId, 'or', raw.or);
  return buildCriterion(predicateId, raw);
}

/**
 * Parse a whole rule library document (`{ "predicates": [...] }`)
 * @throws ReconError INVALID_PREDICATE or UNKNOWN_OPERATOR
 */
export function parsePredicateLibrary(input: unknown): PredicateDefinition[] {
  const parsed = predicateLibrarySchema.safeParse(input);
  if (!parsed.success) {
    throw new ReconError({
      code: 'INVALID_PREDICATE',
      message: `Invalid rule library:\n${formatIssues(parsed.error)}`,
      suggestion: 'Fix the rule library JSON so it matches the predicate format.',
    });
  }

  return parsed.data.predicates.map((raw) => {
    const combineWith: CombineWith = raw.and !== undefined ? 'and' : 'or';
    return {
      id: raw.id,
      name: raw.name,
      debug: raw.debug ?? false,
      requiredColumns: raw.requiredColumns ?? [],
      root: buildGroup(raw.id, combineWith, raw.and ?? raw.or ?? []),
    };
  });
}
