/**
 * Session scope
 *
 * One session per async call chain, so request handlers can reach "the"
 * session without passing it around.
 *
 * @module @badgegate/auth/session/scope
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { DatabaseError, ErrorCodes } from '@badgegate/core'
import { ALLOW, type Badge } from '../badge.js'
import type { BadgeScope } from '../context/badge-context.js'
import type { AuthSession } from './auth-session.js'
import type { DynamicDatabase } from '../utils/type-utils.js'

export type SessionFactory<DB, TActor> = (badge: Badge<TActor>) => Promise<AuthSession<DB, TActor>>

/**
 * Scoped access to a session per async context.
 *
 * NOTE: `badge` and `switchBadge()` act on the session of the current call
 * chain only, and `defaultBadge` only applies to sessions created after it
 * was set. Neither reaches sessions that already exist in other call chains.
 *
 * @example
 * ```typescript
 * const scope = createSessionScope(badge => createAuthSession({ db, entities: [Data], badge }))
 *
 * app.use(async (req, res, next) => {
 *   await scope.run(async session => {
 *     session.badge = req.user.id
 *     await next()
 *     await session.commit()
 *   })
 * })
 *
 * // anywhere below
 * const rows = await scope.current().all(Data)
 * ```
 */
export class SessionScope<DB = DynamicDatabase, TActor = unknown> {
  private readonly storage = new AsyncLocalStorage<AuthSession<DB, TActor>>()

  constructor(
    private readonly factory: SessionFactory<DB, TActor>,
    public defaultBadge: Badge<TActor> = ALLOW
  ) {}

  /**
   * Run `fn` with a session. A nested call reuses the enclosing session;
   * the outermost call closes it when `fn` settles, rolling back anything
   * not committed.
   */
  async run<T>(fn: (session: AuthSession<DB, TActor>) => Promise<T>): Promise<T> {
    const existing = this.storage.getStore()
    if (existing && !existing.isClosed) {
      return fn(existing)
    }

    const session = await this.factory(this.defaultBadge)
    try {
      return await this.storage.run(session, () => fn(session))
    } finally {
      await session.close()
    }
  }

  /**
   * Session of the current call chain.
   *
   * @throws DatabaseError (`SESSION_NOT_ACTIVE`) outside `run()`
   */
  current(): AuthSession<DB, TActor> {
    const session = this.storage.getStore()
    if (!session) {
      throw new DatabaseError('No session in the current async context', ErrorCodes.SESSION_NOT_ACTIVE)
    }
    return session
  }

  get active(): boolean {
    return this.storage.getStore() !== undefined
  }

  get badge(): Badge<TActor> {
    return this.current().badge
  }

  set badge(badge: Badge<TActor>) {
    this.current().badge = badge
  }

  switchBadge(badge: Badge<TActor> = ALLOW): BadgeScope<TActor> {
    return this.current().switchBadge(badge)
  }
}

export function createSessionScope<DB = DynamicDatabase, TActor = unknown>(
  factory: SessionFactory<DB, TActor>,
  options: { defaultBadge?: Badge<TActor> } = {}
): SessionScope<DB, TActor> {
  return new SessionScope(factory, options.defaultBadge ?? ALLOW)
}
