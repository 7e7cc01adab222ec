/**
 * Badge filter plugin
 *
 * Kysely calls `transformQuery` every time a statement is compiled, whether
 * for `execute()` or for `compile()`. That makes it the single point where the
 * current badge is applied:
 * - Deny: the statement fails before it reaches the database
 * - raw `sql` statements: passed through unfiltered, with a warning
 * - Allow: passed through unchanged
 * - actor badge: every SELECT, UPDATE and DELETE in the tree is narrowed by the
 *   `addAuthFilters` of the entities it reads
 *
 * @module @badgegate/auth/plugin
 */

import {
  RawNode,
  type KyselyPlugin,
  type PluginTransformQueryArgs,
  type PluginTransformResultArgs,
  type QueryResult,
  type RootOperationNode,
  type UnknownRow
} from 'kysely'
import { createPrefixedLogger, resolveLogger, type BadgeLogger } from '@badgegate/core'
import { describeBadge, isAllow, isDeny } from './badge.js'
import type { BadgeContext } from './context/badge-context.js'
import { EntityRegistry } from './entity/registry.js'
import type { EntityType } from './entity/auth-base.js'
import { BadgeFilterTransformer } from './transformer/filter-transformer.js'
import { AccessDeniedError, FilterRecursionError } from './errors.js'

export interface BadgeFilterPluginOptions<TActor = unknown> {
  /** Badge slot consulted on every compile */
  context: BadgeContext<TActor>
  /** Entity classes whose tables are filtered */
  entities: EntityRegistry | Iterable<EntityType>
  /** Logger for filter decisions */
  logger?: BadgeLogger
}

const OPERATION_NAMES: Readonly<Record<string, string>> = {
  SelectQueryNode: 'select',
  InsertQueryNode: 'insert',
  UpdateQueryNode: 'update',
  DeleteQueryNode: 'delete',
  MergeQueryNode: 'merge',
  RawNode: 'raw statement'
}

export function describeOperation(node: RootOperationNode): string {
  return OPERATION_NAMES[node.kind] ?? node.kind
}

/**
 * Kysely plugin applying the badge of a {@link BadgeContext}.
 *
 * @example
 * ```typescript
 * const context = new BadgeContext<number>(1)
 * const filtered = db.withPlugin(new BadgeFilterPlugin({ context, entities: [Data] }))
 *
 * filtered.selectFrom('data').selectAll().compile().sql
 * // select * from "data" where "data"."owner" = ?
 * ```
 */
export class BadgeFilterPlugin<TActor = unknown> implements KyselyPlugin {
  readonly context: BadgeContext<TActor>
  readonly registry: EntityRegistry
  private readonly logger: BadgeLogger
  #transforming = false

  constructor(options: BadgeFilterPluginOptions<TActor>) {
    this.context = options.context
    this.registry =
      options.entities instanceof EntityRegistry ? options.entities : new EntityRegistry(options.entities)
    this.logger = createPrefixedLogger('badge-filter', resolveLogger(options.logger))
  }

  transformQuery(args: PluginTransformQueryArgs): RootOperationNode {
    const { node } = args
    const badge = this.context.badge

    if (isDeny(badge)) {
      const operation = describeOperation(node)
      this.logger.warn(`Rejected ${operation} under ${describeBadge(badge)}`)
      throw new AccessDeniedError(operation)
    }

    if (RawNode.is(node)) {
      this.logger.warn('Raw statement compiled without filters', {
        badge: describeBadge(badge),
        sql: node.sqlFragments.join('?')
      })
      return node
    }

    if (isAllow(badge)) {
      return node
    }

    if (this.#transforming) {
      throw new FilterRecursionError()
    }

    this.#transforming = true
    try {
      const transformer = new BadgeFilterTransformer(this.registry, badge)
      const transformed = transformer.transformNode(node)
      if (transformer.filtered.length > 0) {
        this.logger.debug(`Filtered ${describeOperation(node)}`, {
          badge: describeBadge(badge),
          references: transformer.filtered
        })
      }
      return transformed
    } finally {
      this.#transforming = false
    }
  }

  async transformResult(args: PluginTransformResultArgs): Promise<QueryResult<UnknownRow>> {
    return args.result
  }
}
