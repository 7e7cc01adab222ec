import { describe, it, expect } from 'vitest'
import { ALLOW, BadgeContext, DENY } from '../../src/index.js'

describe('BadgeContext', () => {
  it('should start as Allow', () => {
    expect(new BadgeContext().badge).toBe(ALLOW)
  })

  it('should hold the initial badge', () => {
    const context = new BadgeContext<string>('user1')
    expect(context.badge).toBe('user1')
    expect(context.get()).toBe('user1')
  })

  it('should replace the badge through the setter and set()', () => {
    const context = new BadgeContext<string>('user1')
    context.badge = 'user2'
    expect(context.get()).toBe('user2')
    context.set(DENY)
    expect(context.badge).toBe(DENY)
  })

  describe('scoped', () => {
    it('should install a badge and restore the previous one on release', () => {
      const context = new BadgeContext<string>('user2')

      const scope = context.scoped('tmp')
      expect(context.badge).toBe('tmp')
      expect(scope.previous).toBe('user2')
      expect(scope.badge).toBe('tmp')
      expect(scope.released).toBe(false)

      scope.release()
      expect(context.badge).toBe('user2')
      expect(scope.released).toBe(true)
    })

    it('should unwind nested scopes in reverse order', () => {
      const context = new BadgeContext<string>()

      const outer = context.scoped('tmp1')
      const inner = context.scoped('tmp1')
      expect(context.badge).toBe('tmp1')
      context.badge = 'tmp2'

      inner.release()
      expect(context.badge).toBe('tmp1')
      outer.release()
      expect(context.badge).toBe(ALLOW)
    })

    it('should keep a badge assigned directly inside a scope until release', () => {
      const context = new BadgeContext<string>('user1')
      const scope = context.scoped(ALLOW)
      context.badge = 'user3'
      expect(context.badge).toBe('user3')
      scope.release()
      expect(context.badge).toBe('user1')
    })

    it('should ignore a second release', () => {
      const context = new BadgeContext<string>('user1')
      const scope = context.scoped('user2')
      scope.release()
      context.badge = 'user3'
      scope.release()
      expect(context.badge).toBe('user3')
    })

    it('should leave the last recorded badge when released out of order', () => {
      const context = new BadgeContext<string>('a')
      const first = context.scoped('b')
      const second = context.scoped('c')

      first.release()
      expect(context.badge).toBe('a')
      second.release()
      expect(context.badge).toBe('b')
    })
  })

  describe('run', () => {
    it('should run under the badge and restore it', () => {
      const context = new BadgeContext<number>(1)
      const seen = context.run(2, () => context.badge)
      expect(seen).toBe(2)
      expect(context.badge).toBe(1)
    })

    it('should restore the badge when the callback throws', () => {
      const context = new BadgeContext<number>(1)
      expect(() =>
        context.run(DENY, () => {
          throw new Error('boom')
        })
      ).toThrow('boom')
      expect(context.badge).toBe(1)
    })

    it('should restore each enclosing badge when a block three levels deep throws', () => {
      const context = new BadgeContext<number>(1)
      const unwound: unknown[] = []

      expect(() =>
        context.run(2, () => {
          try {
            context.run(3, () => {
              try {
                context.run(DENY, () => {
                  unwound.push(context.badge)
                  throw new Error('innermost')
                })
              } finally {
                unwound.push(context.badge)
              }
            })
          } finally {
            unwound.push(context.badge)
          }
        })
      ).toThrow('innermost')

      expect(unwound).toEqual([DENY, 3, 2])
      expect(context.badge).toBe(1)
    })
  })

  describe('runAsync', () => {
    it('should keep the badge until the promise settles', async () => {
      const context = new BadgeContext<number>(1)
      const seen = await context.runAsync(2, async () => {
        await Promise.resolve()
        return context.badge
      })
      expect(seen).toBe(2)
      expect(context.badge).toBe(1)
    })

    it('should restore the badge when the promise rejects', async () => {
      const context = new BadgeContext<number>(1)
      await expect(
        context.runAsync(3, async () => {
          throw new Error('boom')
        })
      ).rejects.toThrow('boom')
      expect(context.badge).toBe(1)
    })
  })
})
