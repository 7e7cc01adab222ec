/**
 * Entity resolver
 *
 * Finds the registered entities a select, update or delete reads from. Every
 * FROM item, JOIN target, UPDATE target and DELETE ... USING table contributes
 * its scope name (alias or table name); the ones backed by a registered table
 * also contribute an entity. Derived tables and raw sources contribute a name
 * only: their own SELECTs are resolved separately when the transformer
 * reaches them.
 *
 * @module @badgegate/auth/resolver
 */

import { AliasNode, IdentifierNode, ReferenceNode, SelectQueryNode, TableNode, type OperationNode } from 'kysely'
import type { FilterTarget } from '../query/auth-query.js'
import type { FilterableNode } from '../query/predicates.js'
import type { EntityRegistry } from '../entity/registry.js'
import { ResolutionError } from '../errors.js'

export type ResolvedEntity = FilterTarget

export interface Resolution {
  /** Entities in order of appearance: FROM items, then JOINs */
  readonly entities: readonly ResolvedEntity[]
  /** Every name the query's own clauses may qualify columns with */
  readonly scope: ReadonlySet<string>
}

interface Source {
  readonly reference: string
  readonly table?: { readonly name: string; readonly schema?: string }
  readonly aliased: boolean
}

function tableOf(node: TableNode): { name: string; schema?: string } {
  const schema = node.table.schema?.name
  return schema ? { name: node.table.identifier.name, schema } : { name: node.table.identifier.name }
}

function describeSource(node: OperationNode): Source | undefined {
  if (TableNode.is(node)) {
    const table = tableOf(node)
    return { reference: table.name, table, aliased: false }
  }

  if (AliasNode.is(node) && IdentifierNode.is(node.alias)) {
    const reference = node.alias.name
    if (TableNode.is(node.node)) {
      return { reference, table: tableOf(node.node), aliased: true }
    }
    return { reference, aliased: true }
  }

  return undefined
}

function sourcesOf(node: FilterableNode): OperationNode[] {
  const joins = (node.joins ?? []).map(join => join.table)

  switch (node.kind) {
    case 'SelectQueryNode':
      return [...(node.from?.froms ?? []), ...joins]
    case 'UpdateQueryNode':
      return [...(node.table ? [node.table] : []), ...(node.from?.froms ?? []), ...joins]
    case 'DeleteQueryNode':
      return [...node.from.froms, ...(node.using?.tables ?? []), ...joins]
  }
}

function entityOfSource(source: Source, registry: EntityRegistry): ResolvedEntity | undefined {
  if (!source.table) {
    return undefined
  }
  const entity = registry.forTable(source.table.name, source.table.schema)
  if (!entity) {
    return undefined
  }
  return {
    entity,
    table: source.table.name,
    ...(source.table.schema !== undefined && { schema: source.table.schema }),
    reference: source.reference,
    aliased: source.aliased
  }
}

/**
 * Registered entity behind a single table or aliased table node, if any.
 */
export function resolveTable(node: OperationNode, registry: EntityRegistry): ResolvedEntity | undefined {
  const source = describeSource(node)
  return source ? entityOfSource(source, registry) : undefined
}

function selectionQualifier(selection: OperationNode): string | undefined {
  const node = AliasNode.is(selection) ? selection.node : selection
  if (ReferenceNode.is(node) && node.table) {
    return node.table.table.identifier.name
  }
  return undefined
}

/**
 * Resolve the entities of `node`.
 *
 * A selection qualified by a name that is neither in the query's own scope
 * nor in `outerScope` (the enclosing queries of a correlated subquery) is a
 * shape the resolver cannot account for and raises {@link ResolutionError}.
 *
 * @example
 * ```typescript
 * const node = db.selectFrom('widget').innerJoin('company', 'company.id', 'widget.company_id')
 *   .selectAll('widget').toOperationNode()
 *
 * resolveEntities(node, registry).entities.map(e => e.entity)
 * // [Widget, Company]
 * ```
 */
export function resolveEntities(
  node: FilterableNode,
  registry: EntityRegistry,
  outerScope: ReadonlySet<string> = new Set()
): Resolution {
  const entities = new Map<string, ResolvedEntity>()
  const scope = new Set<string>()

  for (const sourceNode of sourcesOf(node)) {
    const source = describeSource(sourceNode)
    if (!source) {
      continue
    }
    scope.add(source.reference)
    if (entities.has(source.reference)) {
      continue
    }
    const resolved = entityOfSource(source, registry)
    if (resolved) {
      entities.set(source.reference, resolved)
    }
  }

  if (SelectQueryNode.is(node)) {
    for (const selection of node.selections ?? []) {
      const qualifier = selectionQualifier(selection.selection)
      if (qualifier !== undefined && !scope.has(qualifier) && !outerScope.has(qualifier)) {
        throw new ResolutionError(qualifier)
      }
    }
  }

  return { entities: [...entities.values()], scope }
}
