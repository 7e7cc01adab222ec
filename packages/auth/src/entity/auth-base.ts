/**
 * Entity base class
 *
 * Entities are plain classes naming their table. They opt into row filtering
 * by overriding the static {@link AuthBase.addAuthFilters} and into insert
 * stamping by overriding {@link AuthBase.addAuthInsertData}.
 *
 * @module @badgegate/auth/entity
 */

import type { AuthQuery } from '../query/auth-query.js'

/**
 * Constructor side of an entity class.
 */
export interface EntityType<E extends AuthBase = AuthBase> {
  new (): E
  readonly prototype: E
  readonly name: string
  /** Table the entity is stored in */
  readonly tableName: string
  /** Optional schema of {@link tableName} */
  readonly schema?: string
  /** Primary key column, `id` when omitted */
  readonly primaryKey?: string
  /** Persisted columns; defaults to the instance's public own fields */
  readonly columns?: readonly string[]
  addAuthFilters(query: AuthQuery, badge: unknown): AuthQuery
}

export abstract class AuthBase {
  /**
   * Narrow `query` to the rows `badge` may see. Never called with the Allow or
   * Deny badge. The default adds nothing.
   */
  static addAuthFilters(query: AuthQuery, _badge: unknown): AuthQuery {
    return query
  }

  /**
   * Create an instance and assign `values` to it.
   *
   * @example
   * ```typescript
   * const row = Data.build({ id: 7, owner: 1, data: 'A' })
   * ```
   */
  static build<T extends AuthBase>(this: new () => T, values: Partial<T>): T {
    return Object.assign(new this(), values)
  }

  /**
   * Stamp badge-derived values onto a new instance as it is added to a
   * session. Called once per instance, only for actor badges. The default
   * does nothing.
   */
  addAuthInsertData(_badge: unknown): void {
    // nothing to stamp
  }
}

export function primaryKeyOf(entity: EntityType): string {
  return entity.primaryKey ?? 'id'
}
