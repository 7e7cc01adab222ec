/**
 * Badge Context
 *
 * The single mutable badge slot of a session. The filter plugin and every
 * instance loaded through the session hold the same context by reference, so
 * a badge change is visible to all of them at once.
 *
 * @module @badgegate/auth/context
 */

import { ALLOW, type Badge } from '../badge.js'

/**
 * Guard returned by {@link BadgeContext.scoped}. Releasing it puts back the
 * badge that was current when the scope was opened.
 */
export interface BadgeScope<TActor = unknown> {
  /** Badge that was current before the scope was opened */
  readonly previous: Badge<TActor>
  /** Badge the scope installed */
  readonly badge: Badge<TActor>
  /** Whether {@link release} has run */
  readonly released: boolean
  /** Restore {@link previous}. Later calls do nothing. */
  release(): void
}

class Scope<TActor> implements BadgeScope<TActor> {
  #released = false

  constructor(
    private readonly context: BadgeContext<TActor>,
    readonly previous: Badge<TActor>,
    readonly badge: Badge<TActor>
  ) {}

  get released(): boolean {
    return this.#released
  }

  release(): void {
    if (this.#released) {
      return
    }
    this.#released = true
    this.context.set(this.previous)
  }
}

/**
 * Holds the current badge.
 *
 * Scopes nest: each restores what it saw, so releasing them in reverse order of
 * creation unwinds to the original badge. Releasing out of order is not
 * prevented and leaves whatever the last released scope recorded.
 *
 * @example
 * ```typescript
 * const context = new BadgeContext<number>(1)
 *
 * context.run(ALLOW, () => {
 *   // unrestricted here
 * })
 *
 * const scope = context.scoped(2)
 * try {
 *   // badge is 2
 * } finally {
 *   scope.release() // badge is 1 again
 * }
 * ```
 */
export class BadgeContext<TActor = unknown> {
  #badge: Badge<TActor>

  constructor(initial: Badge<TActor> = ALLOW) {
    this.#badge = initial
  }

  get badge(): Badge<TActor> {
    return this.#badge
  }

  set badge(badge: Badge<TActor>) {
    this.#badge = badge
  }

  get(): Badge<TActor> {
    return this.#badge
  }

  set(badge: Badge<TActor>): void {
    this.#badge = badge
  }

  /**
   * Install `badge` until the returned scope is released.
   */
  scoped(badge: Badge<TActor>): BadgeScope<TActor> {
    const scope = new Scope(this, this.#badge, badge)
    this.#badge = badge
    return scope
  }

  /**
   * Run `fn` under `badge`, restoring the previous badge however `fn` exits.
   */
  run<T>(badge: Badge<TActor>, fn: () => T): T {
    const scope = this.scoped(badge)
    try {
      return fn()
    } finally {
      scope.release()
    }
  }

  /**
   * Async counterpart of {@link run}. The badge stays installed until the
   * returned promise settles; other work on the same context in the meantime
   * sees it too.
   */
  async runAsync<T>(badge: Badge<TActor>, fn: () => Promise<T>): Promise<T> {
    const scope = this.scoped(badge)
    try {
      return await fn()
    } finally {
      scope.release()
    }
  }
}
