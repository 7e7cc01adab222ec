import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { getEnv, getEnvFlag } from '../src/helpers.js'

describe('getEnv', () => {
  const originalEnv = process.env

  beforeEach(() => {
    process.env = { ...originalEnv }
  })

  afterEach(() => {
    process.env = originalEnv
  })

  it('should return the value of an existing variable', () => {
    process.env['BADGEGATE_TEST_VAR'] = 'test_value'
    expect(getEnv('BADGEGATE_TEST_VAR')).toBe('test_value')
  })

  it('should return undefined for a missing variable', () => {
    delete process.env['BADGEGATE_MISSING_VAR']
    expect(getEnv('BADGEGATE_MISSING_VAR')).toBeUndefined()
  })

  it('should return an empty string unchanged', () => {
    process.env['BADGEGATE_EMPTY_VAR'] = ''
    expect(getEnv('BADGEGATE_EMPTY_VAR')).toBe('')
  })
})

describe('getEnvFlag', () => {
  const originalEnv = process.env

  beforeEach(() => {
    process.env = { ...originalEnv }
  })

  afterEach(() => {
    process.env = originalEnv
  })

  it.each(['1', 'true', 'TRUE', ' yes ', 'on'])('should treat %j as set', value => {
    process.env['BADGEGATE_FLAG'] = value
    expect(getEnvFlag('BADGEGATE_FLAG')).toBe(true)
  })

  it.each(['', '0', 'false', 'off'])('should treat %j as unset', value => {
    process.env['BADGEGATE_FLAG'] = value
    expect(getEnvFlag('BADGEGATE_FLAG')).toBe(false)
  })

  it('should treat a missing variable as unset', () => {
    delete process.env['BADGEGATE_FLAG']
    expect(getEnvFlag('BADGEGATE_FLAG')).toBe(false)
  })
})
