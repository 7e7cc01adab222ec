import { AuthBase } from '../entity/auth-base.js'
import { blockedAttributes, createGate } from './gate.js'
import { publicFields } from './state.js'

/**
 * Base class for entities with field-level restrictions.
 *
 * Instances are returned wrapped in a gate. Once an instance is loaded through
 * a session, reading an attribute in {@link blockedReadAttributes} or writing
 * one in {@link blockedWriteAttributes} throws `BlockedAttributeError`. Nothing
 * is checked while the instance is unbound, detached, outside an open
 * transaction, or while the session's badge is Allow. Under the Deny badge
 * every public field is blocked.
 *
 * Callbacks may read `this` freely; checks are suspended while they run.
 *
 * @example
 * ```typescript
 * class Data extends BlockBase {
 *   static readonly tableName = 'data'
 *
 *   declare id: number
 *   declare owner: number
 *   declare data: string
 *   declare secret: string
 *
 *   override blockedReadAttributes(badge: unknown): string[] {
 *     return badge === this.owner ? [] : ['secret']
 *   }
 *
 *   override blockedWriteAttributes(): string[] {
 *     return ['id', 'owner']
 *   }
 * }
 * ```
 */
export abstract class BlockBase extends AuthBase {
  constructor() {
    super()
    return createGate(this)
  }

  /**
   * Attributes `badge` may not read. Only called with actor badges.
   */
  blockedReadAttributes(_badge: unknown): Iterable<string> {
    return []
  }

  /**
   * Attributes `badge` may not write. Defaults to the read-blocked set.
   */
  blockedWriteAttributes(badge: unknown): Iterable<string> {
    return this.blockedReadAttributes(badge)
  }

  /**
   * Read-blocked set in force right now; empty when checks are bypassed.
   */
  getBlockedReadAttributes(): Set<string> {
    return blockedAttributes(this, 'read')
  }

  /**
   * Write-blocked set in force right now; empty when checks are bypassed.
   */
  getBlockedWriteAttributes(): Set<string> {
    return blockedAttributes(this, 'write')
  }

  /**
   * Public fields that may be read right now.
   */
  getReadAttributes(): Set<string> {
    const blocked = this.getBlockedReadAttributes()
    return new Set(publicFields(this).filter(field => !blocked.has(field)))
  }

  /**
   * Public fields that may be written right now.
   */
  getWriteAttributes(): Set<string> {
    const blocked = this.getBlockedWriteAttributes()
    return new Set(publicFields(this).filter(field => !blocked.has(field)))
  }
}
