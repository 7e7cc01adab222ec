/**
 * Filter transformer
 * Injects each resolved entity's `addAuthFilters` predicates into every
 * SELECT, UPDATE and DELETE of a query tree, subqueries included, and into the
 * DO UPDATE of an upsert. MERGE into or from a filtered table is rejected.
 */

import {
  OperationNodeTransformer,
  type DeleteQueryNode,
  type InsertQueryNode,
  type MergeQueryNode,
  type SelectQueryNode,
  type UpdateQueryNode
} from 'kysely'
import { AuthQuery } from '../query/auth-query.js'
import type { FilterableNode } from '../query/predicates.js'
import type { EntityRegistry } from '../entity/registry.js'
import { resolveEntities, resolveTable, type Resolution, type ResolvedEntity } from '../resolver/entity-resolver.js'
import { ResolutionError, UnsupportedStatementError } from '../errors.js'

/**
 * One-shot transformer for a single compile under a single actor badge.
 *
 * Children are transformed before a node's own predicates are added, so the
 * predicates (which may carry subqueries of their own) are never filtered
 * again.
 */
export class BadgeFilterTransformer extends OperationNodeTransformer {
  private readonly scopes: ReadonlySet<string>[] = []
  private readonly applied: string[] = []

  constructor(
    private readonly registry: EntityRegistry,
    private readonly badge: unknown
  ) {
    super()
  }

  /**
   * Scope names of the entities filtered so far, in order.
   */
  get filtered(): readonly string[] {
    return this.applied
  }

  protected override transformSelectQuery(node: SelectQueryNode): SelectQueryNode {
    const resolution = this.resolve(node)
    const transformed = this.withinScope(resolution, () => super.transformSelectQuery(node))
    return expectKind(this.applyFilters(transformed, resolution.entities), transformed)
  }

  protected override transformUpdateQuery(node: UpdateQueryNode): UpdateQueryNode {
    const resolution = this.resolve(node)
    const transformed = this.withinScope(resolution, () => super.transformUpdateQuery(node))
    return expectKind(this.applyFilters(transformed, resolution.entities), transformed)
  }

  protected override transformDeleteQuery(node: DeleteQueryNode): DeleteQueryNode {
    const resolution = this.resolve(node)
    const transformed = this.withinScope(resolution, () => super.transformDeleteQuery(node))
    return expectKind(this.applyFilters(transformed, resolution.entities), transformed)
  }

  /**
   * `on conflict ... do update` rewrites an existing row, so the target's
   * filters go into its `where`. `on duplicate key update` has no `where`.
   */
  protected override transformInsertQuery(node: InsertQueryNode): InsertQueryNode {
    const transformed = super.transformInsertQuery(node)
    const into = transformed.into
    const target = into ? resolveTable(into, this.registry) : undefined
    if (!into || !target) {
      return transformed
    }

    if (transformed.onDuplicateKey) {
      throw new UnsupportedStatementError(
        'insert',
        `'on duplicate key update' cannot be narrowed to the rows of '${target.reference}' the badge may see`
      )
    }

    const onConflict = transformed.onConflict
    if (!onConflict?.updates) {
      return transformed
    }
    const update: UpdateQueryNode = { kind: 'UpdateQueryNode', table: into, where: onConflict.updateWhere }
    const narrowed = expectKind(this.applyFilters(update, [target]), update)
    return { ...transformed, onConflict: { ...onConflict, updateWhere: narrowed.where } }
  }

  protected override transformMergeQuery(node: MergeQueryNode): MergeQueryNode {
    const sources = node.using ? [node.into, node.using.table] : [node.into]
    for (const source of sources) {
      const target = resolveTable(source, this.registry)
      if (target) {
        throw new UnsupportedStatementError(
          'merge',
          `'${target.reference}' is a filtered table and merge statements cannot be narrowed; run it under Allow`
        )
      }
    }
    return super.transformMergeQuery(node)
  }

  private resolve(node: FilterableNode): Resolution {
    const outer = new Set<string>()
    for (const scope of this.scopes) {
      for (const name of scope) {
        outer.add(name)
      }
    }
    return resolveEntities(node, this.registry, outer)
  }

  private withinScope<T>(resolution: Resolution, fn: () => T): T {
    this.scopes.push(resolution.scope)
    try {
      return fn()
    } finally {
      this.scopes.pop()
    }
  }

  private applyFilters(node: FilterableNode, entities: readonly ResolvedEntity[]): FilterableNode {
    let query = AuthQuery.of(node)
    for (const target of entities) {
      const previous = query.target
      query = target.entity.addAuthFilters(query.withTarget(target), this.badge).withTarget(previous)
      this.applied.push(target.reference)
    }
    return query.node
  }
}

function expectKind<T extends FilterableNode>(result: FilterableNode, original: T): T {
  if (isSameKind(result, original)) {
    return result
  }
  throw new ResolutionError(
    original.kind,
    `addAuthFilters turned a ${original.kind} into a ${result.kind}; return the query it was given, narrowed`
  )
}

function isSameKind<T extends FilterableNode>(node: FilterableNode, like: T): node is T {
  return node.kind === like.kind
}
