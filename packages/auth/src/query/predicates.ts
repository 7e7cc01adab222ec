/**
 * Predicate nodes
 *
 * Small builders for the operation nodes filter injection adds to a query.
 * They work on nodes rather than query builders so the same predicate can be
 * merged into a select, an update or a delete.
 *
 * @module @badgegate/auth/query/predicates
 */

import {
  AndNode,
  BinaryOperationNode,
  ColumnNode,
  ExpressionWrapper,
  OperatorNode,
  ParensNode,
  PrimitiveValueListNode,
  ReferenceNode,
  SelectQueryNode,
  TableNode,
  UnaryOperationNode,
  ValueNode,
  WhereNode,
  type DeleteQueryNode,
  type Expression,
  type OperationNode,
  type SqlBool,
  type UpdateQueryNode
} from 'kysely'
import type { DynamicDatabase } from '../utils/type-utils.js'

export type FilterableNode = SelectQueryNode | UpdateQueryNode | DeleteQueryNode

export type ComparisonOperator =
  | '='
  | '!='
  | '<>'
  | '<'
  | '<='
  | '>'
  | '>='
  | 'in'
  | 'not in'
  | 'is'
  | 'is not'
  | 'like'
  | 'not like'

/**
 * How a column is qualified inside a query: by alias, by table, or by
 * schema and table.
 */
export interface ColumnQualifier {
  readonly reference: string
  readonly table: string
  readonly schema?: string
  readonly aliased: boolean
}

export function qualifierNode(qualifier: ColumnQualifier): TableNode {
  if (qualifier.aliased || !qualifier.schema) {
    return TableNode.create(qualifier.reference)
  }
  return TableNode.createWithSchema(qualifier.schema, qualifier.table)
}

/**
 * `"qualifier"."column"`, or a bare column without a qualifier.
 */
export function columnNode(column: string, qualifier?: ColumnQualifier): OperationNode {
  if (!qualifier) {
    return ColumnNode.create(column)
  }
  return ReferenceNode.create(ColumnNode.create(column), qualifierNode(qualifier))
}

/**
 * Always-false predicate, rendered as `1 = 0`.
 */
export function alwaysFalse(): OperationNode {
  return BinaryOperationNode.create(ValueNode.createImmediate(1), OperatorNode.create('='), ValueNode.createImmediate(0))
}

/**
 * Always-true predicate, rendered as `1 = 1`.
 */
export function alwaysTrue(): OperationNode {
  return BinaryOperationNode.create(ValueNode.createImmediate(1), OperatorNode.create('='), ValueNode.createImmediate(1))
}

function nullOperator(operator: ComparisonOperator): ComparisonOperator {
  switch (operator) {
    case '=':
      return 'is'
    case '!=':
    case '<>':
      return 'is not'
    default:
      return operator
  }
}

function listOperator(operator: ComparisonOperator): ComparisonOperator {
  switch (operator) {
    case '=':
      return 'in'
    case '!=':
    case '<>':
      return 'not in'
    default:
      return operator
  }
}

/**
 * `<column> <operator> <value>` with the usual normalizations:
 * - `null` compares with `is` / `is not`
 * - arrays compare with `in` / `not in`
 * - an empty array matches nothing under `in` and everything under `not in`
 */
export function compare(column: OperationNode, operator: ComparisonOperator, value: unknown): OperationNode {
  if (value === null) {
    return BinaryOperationNode.create(column, OperatorNode.create(nullOperator(operator)), ValueNode.createImmediate(null))
  }

  if (Array.isArray(value)) {
    const op = listOperator(operator)
    if (value.length === 0) {
      return op === 'not in' ? alwaysTrue() : alwaysFalse()
    }
    return BinaryOperationNode.create(column, OperatorNode.create(op), PrimitiveValueListNode.create(value))
  }

  return BinaryOperationNode.create(column, OperatorNode.create(operator), ValueNode.create(value))
}

/**
 * Whether `node` can stand as one operand of an AND without parentheses.
 * Anything else, raw fragments included, may carry an `or` of its own.
 */
function isSelfContained(node: OperationNode): boolean {
  if (ParensNode.is(node) || BinaryOperationNode.is(node)) {
    return true
  }
  if (AndNode.is(node)) {
    return isSelfContained(node.left) && isSelfContained(node.right)
  }
  // exists (select ...)
  return UnaryOperationNode.is(node) && SelectQueryNode.is(node.operand)
}

function parenthesize(node: OperationNode): OperationNode {
  return isSelfContained(node) ? node : ParensNode.create(node)
}

/**
 * AND together a list of predicates. `undefined` for an empty list; a single
 * predicate is returned as is.
 */
export function conjunction(nodes: readonly OperationNode[]): OperationNode | undefined {
  if (nodes.length < 2) {
    return nodes[0]
  }
  let result: OperationNode | undefined
  for (const node of nodes) {
    result = result ? AndNode.create(result, parenthesize(node)) : parenthesize(node)
  }
  return result
}

/**
 * Equality conditions keyed by column, AND-ed. `undefined` values are skipped;
 * `undefined` is returned when nothing is left.
 */
export function conditionsNode(
  conditions: Readonly<Record<string, unknown>>,
  qualifier?: ColumnQualifier
): OperationNode | undefined {
  const predicates: OperationNode[] = []
  for (const [column, value] of Object.entries(conditions)) {
    if (value !== undefined) {
      predicates.push(compare(columnNode(column, qualifier), '=', value))
    }
  }
  return conjunction(predicates)
}

/**
 * {@link conditionsNode} as an expression query builders accept in `where()`.
 */
export function conditionsExpression(
  conditions: Readonly<Record<string, unknown>>,
  qualifier?: ColumnQualifier
): Expression<SqlBool> | undefined {
  const node = conditionsNode(conditions, qualifier)
  return node ? new ExpressionWrapper<DynamicDatabase, string, SqlBool>(node) : undefined
}

/**
 * Copy of `node` whose WHERE clause is the existing one AND `predicate`.
 */
export function withWhere<T extends FilterableNode>(node: T, predicate: OperationNode): T {
  const combined = node.where ? conjunction([node.where.where, predicate]) : predicate
  return {
    ...node,
    where: WhereNode.create(combined ?? predicate)
  }
}
