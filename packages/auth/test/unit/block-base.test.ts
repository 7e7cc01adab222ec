/**
 * Attribute gate tests
 *
 * Instances are bound to a stand-in unit of work here; the session tests
 * cover binding through real loads.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  ALLOW,
  BadgeContext,
  BlockBase,
  BlockedAttributeError,
  DENY,
  blockedAttributes,
  bindingOf,
  rawTarget,
  type Badge,
  type UnitOfWork
} from '../../src/index.js'
import { bindInstance, unbindInstance } from '../../src/gate/state.js'
import { Data } from '../utils/entities.js'

class BlockedData extends BlockBase {
  static readonly tableName = 'blockeddata'

  declare id: number
  declare allowed_data: string
  declare blocked_read: string
  declare blocked_write: string
  declare blocked_both: string

  override blockedReadAttributes(): string[] {
    return ['blocked_read', 'blocked_both']
  }

  override blockedWriteAttributes(): string[] {
    return ['blocked_write', 'blocked_both']
  }
}

class StandIn implements UnitOfWork {
  isActive = true
  readonly members = new Set<object>()

  contains(instance: object): boolean {
    return this.members.has(instance)
  }
}

function bound<T extends BlockBase>(instance: T, badge: Badge<unknown>) {
  const context = new BadgeContext<unknown>(badge)
  const unitOfWork = new StandIn()
  unitOfWork.members.add(instance)
  bindInstance(instance, { context, unitOfWork })
  return { instance, context, unitOfWork }
}

function blockedData(): BlockedData {
  return BlockedData.build({
    id: 1,
    allowed_data: 'This is ok',
    blocked_read: 'do not allow reads',
    blocked_write: 'do not allow writes',
    blocked_both: 'do not allow'
  })
}

describe('BlockBase', () => {
  describe('bypass', () => {
    it('should not check unbound instances', () => {
      const instance = blockedData()
      expect(instance.blocked_both).toBe('do not allow')
      instance.blocked_both = 'changed'
      expect(instance.blocked_both).toBe('changed')
    })

    it('should not check under Allow', () => {
      const { instance } = bound(blockedData(), ALLOW)
      const value = instance.blocked_both
      instance.blocked_both = value
      expect(instance.getBlockedReadAttributes()).toEqual(new Set())
    })

    it('should not check when no transaction is open', () => {
      const { instance, unitOfWork } = bound(blockedData(), 1)
      unitOfWork.isActive = false
      expect(instance.blocked_read).toBe('do not allow reads')
    })

    it('should not check instances the unit of work no longer holds', () => {
      const { instance, unitOfWork } = bound(blockedData(), 1)
      unitOfWork.members.clear()
      expect(instance.blocked_read).toBe('do not allow reads')
    })

    it('should not check once unbound', () => {
      const { instance } = bound(blockedData(), 1)
      unbindInstance(instance)
      expect(bindingOf(instance)).toBeUndefined()
      expect(instance.blocked_read).toBe('do not allow reads')
    })
  })

  describe('actor badges', () => {
    it('should allow unblocked attributes', () => {
      const { instance } = bound(blockedData(), 1)
      const value = instance.allowed_data
      instance.allowed_data = value
      expect(instance.allowed_data).toBe('This is ok')
    })

    it('should block reads of read-blocked attributes only', () => {
      const { instance } = bound(blockedData(), 1)
      expect(() => instance.blocked_read).toThrow(BlockedAttributeError)
      instance.blocked_read = 'written'
      expect(rawTarget(instance)).toHaveProperty('blocked_read', 'written')
    })

    it('should block writes of write-blocked attributes only', () => {
      const { instance } = bound(blockedData(), 1)
      expect(instance.blocked_write).toBe('do not allow writes')
      expect(() => {
        instance.blocked_write = 'value'
      }).toThrow(BlockedAttributeError)
      expect(instance.blocked_write).toBe('do not allow writes')
    })

    it('should block both ways', () => {
      const { instance, context } = bound(blockedData(), 1)
      expect(() => instance.blocked_both).toThrow(BlockedAttributeError)
      expect(() => {
        instance.blocked_both = 'value'
      }).toThrow(BlockedAttributeError)

      context.badge = ALLOW
      expect(instance.blocked_both).toBe('do not allow')
    })

    it('should treat delete as a write', () => {
      const { instance } = bound(blockedData(), 1)
      expect(() => Reflect.deleteProperty(instance, 'blocked_write')).toThrow(BlockedAttributeError)
      expect(Reflect.deleteProperty(instance, 'allowed_data')).toBe(true)
    })

    it('should describe the failure', () => {
      const { instance } = bound(blockedData(), 1)
      let error: unknown
      try {
        void instance.blocked_read
      } catch (caught) {
        error = caught
      }

      expect(error).toBeInstanceOf(BlockedAttributeError)
      expect(error).toMatchObject({
        message:
          "Cannot read attribute 'blocked_read' of BlockedData(blockeddata)#1 under badge 1 (blocked: blocked_both, blocked_read)",
        code: 'BADGE_ATTRIBUTE_BLOCKED',
        access: 'read',
        attribute: 'blocked_read',
        badge: '1',
        blocked: ['blocked_both', 'blocked_read'],
        target: 'BlockedData(blockeddata)#1'
      })
    })

    it('should let callbacks read blocked attributes of the instance', () => {
      const row = Data.build({ id: 3, owner: 2, data: 'B', secret: 's3' })
      const { instance, context } = bound(row, 2)
      expect(instance.secret).toBe('s3')

      context.badge = 3
      expect(() => instance.secret).toThrow(
        "Cannot read attribute 'secret' of Data(data)#3 under badge 3 (blocked: secret)"
      )
    })

    it('should follow the badge of the bound context', () => {
      const { instance, context } = bound(Data.build({ id: 3, owner: 2, data: 'B', secret: 's3' }), 3)
      expect(instance.getBlockedReadAttributes()).toEqual(new Set(['secret']))
      context.badge = 2
      expect(instance.getBlockedReadAttributes()).toEqual(new Set())
    })
  })

  describe('Deny', () => {
    it('should block every public field without asking the instance', () => {
      const instance = blockedData()
      const spy = vi.spyOn(instance, 'blockedReadAttributes')
      bound(instance, DENY)

      expect(() => instance.allowed_data).toThrow(BlockedAttributeError)
      expect(() => {
        instance.id = 2
      }).toThrow(BlockedAttributeError)
      expect(spy).not.toHaveBeenCalled()
    })

    it('should still allow methods', () => {
      const { instance } = bound(blockedData(), DENY)
      expect(instance.getReadAttributes()).toEqual(new Set())
      expect(instance.getBlockedWriteAttributes()).toEqual(
        new Set(['id', 'allowed_data', 'blocked_read', 'blocked_write', 'blocked_both'])
      )
    })
  })

  describe('attribute sets', () => {
    class AttributeCheck extends BlockBase {
      static readonly tableName = 'attributecheck'

      declare id: number
      declare owner: string
      declare data: string
      declare secret: string
      declare _internal: string

      override blockedReadAttributes(): string[] {
        return ['secret']
      }

      override blockedWriteAttributes(): string[] {
        return ['id', 'owner']
      }
    }

    function attributeCheck() {
      return bound(AttributeCheck.build({ id: 1, owner: 'alice', data: 'bicycle', secret: 'clover', _internal: 'x' }), 1)
        .instance
    }

    it('should list readable attributes', () => {
      expect(attributeCheck().getReadAttributes()).toEqual(new Set(['id', 'owner', 'data']))
    })

    it('should list writable attributes', () => {
      expect(attributeCheck().getWriteAttributes()).toEqual(new Set(['data', 'secret']))
    })

    it('should list blocked attributes', () => {
      const instance = attributeCheck()
      expect(instance.getBlockedReadAttributes()).toEqual(new Set(['secret']))
      expect(instance.getBlockedWriteAttributes()).toEqual(new Set(['id', 'owner']))
    })

    it('should default the write-blocked set to the read-blocked set', () => {
      class ReadOnlySecret extends BlockBase {
        declare secret: string

        override blockedReadAttributes(): string[] {
          return ['secret']
        }
      }
      const { instance } = bound(ReadOnlySecret.build({ secret: 'x' }), 1)
      expect(instance.getBlockedWriteAttributes()).toEqual(new Set(['secret']))
      expect(blockedAttributes(instance, 'write')).toEqual(new Set(['secret']))
    })
  })

  it('should report nothing blocked for objects without a gate', () => {
    expect(blockedAttributes({ secret: 'x' }, 'read')).toEqual(new Set())
  })
})
