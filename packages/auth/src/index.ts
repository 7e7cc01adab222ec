/**
 * @badgegate/auth - badge-based row filtering and attribute gating for Kysely
 *
 * Injects per-entity filters into every query compiled under a badge, blocks
 * attribute access on loaded instances, and stamps new instances on insert.
 *
 * @packageDocumentation
 */

// ============================================================================
// Badges
// ============================================================================

export { ALLOW, DENY, isAllow, isDeny, isActor, badgeKind, describeBadge } from './badge.js'
export type { Allow, Deny, Badge, BadgeKind } from './badge.js'

export { BadgeContext, type BadgeScope } from './context/badge-context.js'

// ============================================================================
// Entities
// ============================================================================

export { AuthBase, primaryKeyOf, type EntityType } from './entity/auth-base.js'
export { EntityRegistry } from './entity/registry.js'
export { BlockBase } from './gate/block-base.js'
export { blockedAttributes } from './gate/gate.js'
export { bindingOf, rawTarget } from './gate/state.js'
export type { Gated, SessionBinding, UnitOfWork } from './gate/state.js'

// ============================================================================
// Filtering
// ============================================================================

export { BadgeFilterPlugin, describeOperation, type BadgeFilterPluginOptions } from './plugin.js'
export { BadgeFilterTransformer } from './transformer/filter-transformer.js'
export { resolveEntities, resolveTable, type Resolution, type ResolvedEntity } from './resolver/entity-resolver.js'
export { AuthQuery } from './query/auth-query.js'
export type {
  AuthOperation,
  ColumnRef,
  FilterExpression,
  FilterExpressionFactory,
  FilterTarget
} from './query/auth-query.js'
export {
  alwaysFalse,
  alwaysTrue,
  columnNode,
  compare,
  conditionsExpression,
  conditionsNode,
  conjunction,
  withWhere,
  type ColumnQualifier,
  type ComparisonOperator,
  type FilterableNode
} from './query/predicates.js'

// ============================================================================
// Sessions
// ============================================================================

export {
  AuthSession,
  AuthSessionOptionsSchema,
  createAuthSession,
  type AuthSessionConfig,
  type AuthSessionOptions,
  type Conditions,
  type Executable
} from './session/auth-session.js'
export { SessionScope, createSessionScope, type SessionFactory } from './session/session-scope.js'

// ============================================================================
// Errors
// ============================================================================

export {
  BadgeErrorCodes,
  BadgeError,
  AccessDeniedError,
  BlockedAttributeError,
  ResolutionError,
  FilterRecursionError,
  UnsupportedConfigurationError,
  UnsupportedStatementError,
  UnregisteredEntityError,
  IncompleteRowError,
  type BadgeErrorCode,
  type AttributeAccess
} from './errors.js'

export type { DynamicDatabase, DynamicRow } from './utils/type-utils.js'
