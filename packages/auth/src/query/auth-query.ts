/**
 * Auth Query
 *
 * The value an entity's `addAuthFilters` receives and returns. It wraps the
 * operation node being compiled together with the "preferred filter target":
 * the entity and FROM-scope name the callback is currently filtering, so
 * unqualified column names land on the right table even in self-joins.
 *
 * @module @badgegate/auth/query
 */

import {
  expressionBuilder,
  sql,
  type Expression,
  type ExpressionBuilder,
  type OperationNode,
  type RawBuilder,
  type SqlBool
} from 'kysely'
import type { EntityType } from '../entity/auth-base.js'
import type { DynamicDatabase } from '../utils/type-utils.js'
import {
  alwaysFalse,
  columnNode,
  compare,
  conditionsNode,
  withWhere,
  type ColumnQualifier,
  type ComparisonOperator,
  type FilterableNode
} from './predicates.js'

export type AuthOperation = 'select' | 'update' | 'delete'

/**
 * The entity currently being filtered and the name it goes by in the query.
 */
export interface FilterTarget extends ColumnQualifier {
  readonly entity: EntityType
}

/**
 * Reference to a column of the current filter target, usable anywhere Kysely
 * takes an expression.
 */
export type ColumnRef = (column: string) => RawBuilder<unknown>

export type FilterExpressionFactory = (
  eb: ExpressionBuilder<DynamicDatabase, string>,
  ref: ColumnRef
) => Expression<SqlBool>

export type FilterExpression = Expression<SqlBool> | FilterExpressionFactory

function operationOf(node: FilterableNode): AuthOperation {
  switch (node.kind) {
    case 'SelectQueryNode':
      return 'select'
    case 'UpdateQueryNode':
      return 'update'
    case 'DeleteQueryNode':
      return 'delete'
  }
}

/**
 * Immutable query handle passed through `addAuthFilters`.
 *
 * Every narrowing method returns a new `AuthQuery`; predicates are AND-ed into
 * the WHERE clause of the wrapped node.
 *
 * @example
 * ```typescript
 * class Post extends BlockBase {
 *   static readonly tableName = 'posts'
 *
 *   static override addAuthFilters(query: AuthQuery, badge: unknown): AuthQuery {
 *     return query.filter((eb, ref) =>
 *       eb.or([
 *         eb(ref('author_id'), '=', badge),
 *         eb(ref('published'), '=', 1)
 *       ])
 *     )
 *   }
 * }
 * ```
 */
export class AuthQuery {
  private constructor(
    readonly node: FilterableNode,
    readonly target: FilterTarget | undefined
  ) {}

  static of(node: FilterableNode, target?: FilterTarget): AuthQuery {
    return new AuthQuery(node, target)
  }

  get operation(): AuthOperation {
    return operationOf(this.node)
  }

  /**
   * Same query with a different preferred filter target.
   */
  withTarget(target: FilterTarget | undefined): AuthQuery {
    return new AuthQuery(this.node, target)
  }

  /**
   * Column of the current target, qualified by its alias or table name.
   */
  ref: ColumnRef = (column: string) => {
    const target = this.target
    if (!target) {
      return sql.ref(column)
    }
    if (target.aliased || !target.schema) {
      return sql.ref(`${target.reference}.${column}`)
    }
    return sql.ref(`${target.schema}.${target.table}.${column}`)
  }

  /**
   * `where <target>.<column> <operator> <value>`
   */
  where(column: string, operator: ComparisonOperator, value: unknown): AuthQuery {
    return this.narrow(compare(columnNode(column, this.target), operator, value))
  }

  /**
   * Equality conditions keyed by column.
   * - `null` → `is null`
   * - array → `in (...)`, an empty array matches nothing
   * - `undefined` is skipped
   */
  filterBy(values: Readonly<Record<string, unknown>>): AuthQuery {
    const predicate = conditionsNode(values, this.target)
    return predicate ? this.narrow(predicate) : this
  }

  /**
   * Arbitrary boolean expression, or a factory receiving Kysely's expression
   * builder and {@link ref}.
   */
  filter(expression: FilterExpression): AuthQuery {
    const resolved =
      typeof expression === 'function'
        ? expression(expressionBuilder<DynamicDatabase, string>(), this.ref)
        : expression
    return this.narrow(resolved.toOperationNode())
  }

  /**
   * Match nothing.
   */
  deny(): AuthQuery {
    return this.narrow(alwaysFalse())
  }

  private narrow(predicate: OperationNode): AuthQuery {
    return new AuthQuery(withWhere(this.node, predicate), this.target)
  }
}
