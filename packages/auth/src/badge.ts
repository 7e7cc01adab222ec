/**
 * Badges
 *
 * A badge is the opaque token that decides what a caller may see. Two values
 * are reserved: {@link ALLOW} bypasses every check and {@link DENY} fails every
 * statement before it reaches the database. Any other value is an actor badge
 * and is handed, uninterpreted, to the entity callbacks.
 *
 * @module @badgegate/auth/badge
 */

export const ALLOW: unique symbol = Symbol('badgegate.allow')
export const DENY: unique symbol = Symbol('badgegate.deny')

export type Allow = typeof ALLOW
export type Deny = typeof DENY

/**
 * Any badge, with `TActor` describing the application's actor values.
 */
export type Badge<TActor = unknown> = Allow | Deny | TActor

export type BadgeKind = 'allow' | 'deny' | 'actor'

export function isAllow(badge: unknown): badge is Allow {
  return badge === ALLOW
}

export function isDeny(badge: unknown): badge is Deny {
  return badge === DENY
}

/**
 * True for every badge that is neither {@link ALLOW} nor {@link DENY}.
 */
export function isActor<TActor>(badge: Badge<TActor>): badge is Exclude<Badge<TActor>, Allow | Deny> {
  return badge !== ALLOW && badge !== DENY
}

export function badgeKind(badge: unknown): BadgeKind {
  if (badge === ALLOW) return 'allow'
  if (badge === DENY) return 'deny'
  return 'actor'
}

/**
 * Short printable form of a badge for log lines and error messages.
 * Never calls into the badge beyond `String()` on primitives.
 */
export function describeBadge(badge: unknown): string {
  switch (typeof badge) {
    case 'symbol':
      if (badge === ALLOW) return 'ALLOW'
      if (badge === DENY) return 'DENY'
      return badge.toString()
    case 'string':
      return JSON.stringify(badge)
    case 'number':
    case 'bigint':
    case 'boolean':
    case 'undefined':
      return String(badge)
    case 'function':
      return `[function ${badge.name || 'anonymous'}]`
    default:
      if (badge === null) return 'null'
      return `[object ${badge.constructor?.name ?? 'Object'}]`
  }
}
