import { describe, it, expect } from 'vitest'
import { DatabaseError, getErrorCategory } from '@badgegate/core'
import {
  AccessDeniedError,
  BadgeError,
  BadgeErrorCodes,
  BlockedAttributeError,
  FilterRecursionError,
  IncompleteRowError,
  ResolutionError,
  UnregisteredEntityError,
  UnsupportedConfigurationError,
  UnsupportedStatementError
} from '../../src/index.js'

describe('Badge errors', () => {
  it('should all belong to the DatabaseError family', () => {
    const errors = [
      new AccessDeniedError('select'),
      new BlockedAttributeError('read', 'secret', '2', ['secret'], 'Data(data)#1'),
      new ResolutionError('other'),
      new FilterRecursionError(),
      new UnsupportedConfigurationError('cacheStatements', 'no'),
      new UnregisteredEntityError('Ghost'),
      new IncompleteRowError('data', 'id'),
      new UnsupportedStatementError('merge', 'no')
    ]
    for (const error of errors) {
      expect(error).toBeInstanceOf(BadgeError)
      expect(error).toBeInstanceOf(DatabaseError)
      expect(getErrorCategory(error.code)).toBe('BADGE')
    }
  })

  it('should name the operation a Deny badge rejected', () => {
    const error = new AccessDeniedError('update')
    expect(error.message).toBe('Access denied: update is not permitted under the deny badge')
    expect(error.name).toBe('AccessDeniedError')
    expect(error.toJSON()).toEqual({
      name: 'AccessDeniedError',
      message: 'Access denied: update is not permitted under the deny badge',
      code: BadgeErrorCodes.BADGE_ACCESS_DENIED,
      detail: undefined,
      operation: 'update'
    })
  })

  it('should sort the blocked set', () => {
    const error = new BlockedAttributeError('write', 'owner', '"alice"', new Set(['owner', 'id']), 'Data(data)#4')
    expect(error.message).toBe("Cannot write attribute 'owner' of Data(data)#4 under badge \"alice\" (blocked: id, owner)")
    expect(error.detail).toBe('owner')
    expect(error.toJSON()).toEqual({
      name: 'BlockedAttributeError',
      message: "Cannot write attribute 'owner' of Data(data)#4 under badge \"alice\" (blocked: id, owner)",
      code: 'BADGE_ATTRIBUTE_BLOCKED',
      detail: 'owner',
      access: 'write',
      attribute: 'owner',
      badge: '"alice"',
      blocked: ['id', 'owner'],
      target: 'Data(data)#4'
    })
  })

  it('should explain unresolvable references', () => {
    expect(new ResolutionError('other').message).toBe(
      "Cannot resolve 'other': it is not a table or alias in scope of the query"
    )
    const custom = new ResolutionError('SelectQueryNode', 'custom message')
    expect(custom.message).toBe('custom message')
    expect(custom.toJSON()).toMatchObject({ reference: 'SelectQueryNode', code: 'BADGE_RESOLUTION_FAILED' })
  })

  it('should name the unsupported option', () => {
    const error = new UnsupportedConfigurationError('cacheStatements', 'statements depend on the badge')
    expect(error.message).toBe("Unsupported option 'cacheStatements': statements depend on the badge")
    expect(error.toJSON()).toMatchObject({ option: 'cacheStatements', detail: 'cacheStatements' })
  })

  it('should name the statement that cannot be filtered', () => {
    const error = new UnsupportedStatementError('merge', "'data' is a filtered table")
    expect(error.message).toBe("Unsupported merge under an actor badge: 'data' is a filtered table")
    expect(error.toJSON()).toMatchObject({ statement: 'merge', detail: 'merge', code: 'BADGE_UNSUPPORTED_STATEMENT' })
  })

  it('should describe session errors', () => {
    expect(new UnregisteredEntityError('Ghost').message).toBe('Ghost is not registered with this session')
    expect(new IncompleteRowError('data', 'id').message).toBe(
      "Row loaded from 'data' has no 'id' column; select the primary key to materialize instances"
    )
    expect(new FilterRecursionError().code).toBe('BADGE_FILTER_RECURSION')
  })
})
