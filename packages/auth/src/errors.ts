/**
 * Badge Error Classes
 *
 * Errors raised by filter injection, attribute gating and the session. All of
 * them extend `DatabaseError` from @badgegate/core, so callers can catch the
 * whole family at once and serialize any of them with `toJSON()`.
 *
 * @module @badgegate/auth/errors
 */

import { DatabaseError } from '@badgegate/core'

// ============================================================================
// Badge Error Codes
// ============================================================================

export const BadgeErrorCodes = {
  /** The Deny badge was active for a query or a persist */
  BADGE_ACCESS_DENIED: 'BADGE_ACCESS_DENIED',
  /** A blocked attribute was read or written */
  BADGE_ATTRIBUTE_BLOCKED: 'BADGE_ATTRIBUTE_BLOCKED',
  /** A query shape the entity resolver cannot handle */
  BADGE_RESOLUTION_FAILED: 'BADGE_RESOLUTION_FAILED',
  /** A session option that would bypass filtering */
  BADGE_UNSUPPORTED_CONFIGURATION: 'BADGE_UNSUPPORTED_CONFIGURATION',
  /** A statement kind filter injection cannot narrow */
  BADGE_UNSUPPORTED_STATEMENT: 'BADGE_UNSUPPORTED_STATEMENT',
  /** Filter injection re-entered itself */
  BADGE_FILTER_RECURSION: 'BADGE_FILTER_RECURSION',
  /** An instance whose class is not registered with the session */
  BADGE_ENTITY_UNREGISTERED: 'BADGE_ENTITY_UNREGISTERED',
  /** A row loaded without the entity's primary key */
  BADGE_ROW_INCOMPLETE: 'BADGE_ROW_INCOMPLETE'
} as const

export type BadgeErrorCode = (typeof BadgeErrorCodes)[keyof typeof BadgeErrorCodes]

// ============================================================================
// Base Badge Error
// ============================================================================

/**
 * Base class for all badge-related errors
 */
export class BadgeError extends DatabaseError {
  constructor(message: string, code: BadgeErrorCode, detail?: string) {
    super(message, code, detail)
    this.name = 'BadgeError'
  }
}

// ============================================================================
// Access Errors
// ============================================================================

/**
 * Thrown whenever the Deny badge is active and a statement is compiled, or an
 * instance is added or flushed.
 *
 * @example
 * ```typescript
 * session.badge = DENY
 * await session.all(Data) // throws AccessDeniedError
 * ```
 */
export class AccessDeniedError extends BadgeError {
  public readonly operation: string

  constructor(operation: string) {
    super(`Access denied: ${operation} is not permitted under the deny badge`, BadgeErrorCodes.BADGE_ACCESS_DENIED)
    this.name = 'AccessDeniedError'
    this.operation = operation
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation
    }
  }
}

export type AttributeAccess = 'read' | 'write'

/**
 * Thrown when a gate-able instance is asked for, or given, an attribute its
 * blocked set contains.
 *
 * Carries the attribute, the badge description and the blocked set that was
 * in force, so the failure can be diagnosed without touching the instance.
 */
export class BlockedAttributeError extends BadgeError {
  public readonly access: AttributeAccess
  public readonly attribute: string
  public readonly badge: string
  public readonly blocked: readonly string[]
  public readonly target: string

  constructor(access: AttributeAccess, attribute: string, badge: string, blocked: Iterable<string>, target: string) {
    const blockedList = [...blocked].sort()
    super(
      `Cannot ${access} attribute '${attribute}' of ${target} under badge ${badge} (blocked: ${blockedList.join(', ')})`,
      BadgeErrorCodes.BADGE_ATTRIBUTE_BLOCKED,
      attribute
    )
    this.name = 'BlockedAttributeError'
    this.access = access
    this.attribute = attribute
    this.badge = badge
    this.blocked = blockedList
    this.target = target
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      access: this.access,
      attribute: this.attribute,
      badge: this.badge,
      blocked: this.blocked,
      target: this.target
    }
  }
}

// ============================================================================
// Query Errors
// ============================================================================

/**
 * Thrown when the entities of a query cannot be determined, for instance a
 * selection qualified by a name that is in no FROM or JOIN scope.
 */
export class ResolutionError extends BadgeError {
  public readonly reference: string

  constructor(reference: string, message?: string) {
    super(
      message ?? `Cannot resolve '${reference}': it is not a table or alias in scope of the query`,
      BadgeErrorCodes.BADGE_RESOLUTION_FAILED,
      reference
    )
    this.name = 'ResolutionError'
    this.reference = reference
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reference: this.reference
    }
  }
}

/**
 * Thrown under an actor badge for a statement that touches a filtered table
 * in a way no WHERE clause can narrow, such as `merge into`.
 */
export class UnsupportedStatementError extends BadgeError {
  public readonly statement: string

  constructor(statement: string, reason: string) {
    super(`Unsupported ${statement} under an actor badge: ${reason}`, BadgeErrorCodes.BADGE_UNSUPPORTED_STATEMENT, statement)
    this.name = 'UnsupportedStatementError'
    this.statement = statement
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statement: this.statement
    }
  }
}

/**
 * Thrown when filter injection is re-entered while it is already running,
 * typically because `addAuthFilters` compiled a query through the filtered
 * database.
 */
export class FilterRecursionError extends BadgeError {
  constructor() {
    super(
      'Filter injection re-entered itself; build filter subqueries with the expression builder instead of compiling them',
      BadgeErrorCodes.BADGE_FILTER_RECURSION
    )
    this.name = 'FilterRecursionError'
  }
}

// ============================================================================
// Session Errors
// ============================================================================

/**
 * Thrown at session construction for options that would let compiled
 * statements be reused across badges.
 */
export class UnsupportedConfigurationError extends BadgeError {
  public readonly option: string

  constructor(option: string, reason: string) {
    super(`Unsupported option '${option}': ${reason}`, BadgeErrorCodes.BADGE_UNSUPPORTED_CONFIGURATION, option)
    this.name = 'UnsupportedConfigurationError'
    this.option = option
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      option: this.option
    }
  }
}

export class UnregisteredEntityError extends BadgeError {
  constructor(className: string) {
    super(`${className} is not registered with this session`, BadgeErrorCodes.BADGE_ENTITY_UNREGISTERED, className)
    this.name = 'UnregisteredEntityError'
  }
}

export class IncompleteRowError extends BadgeError {
  constructor(table: string, primaryKey: string) {
    super(
      `Row loaded from '${table}' has no '${primaryKey}' column; select the primary key to materialize instances`,
      BadgeErrorCodes.BADGE_ROW_INCOMPLETE,
      table
    )
    this.name = 'IncompleteRowError'
  }
}
