/**
 * Unified error codes for badgegate packages.
 *
 * Codes follow the `CATEGORY_SPECIFIC_ERROR` pattern so the category can be
 * recovered from the code alone (see {@link getErrorCategory}). Packages that
 * add their own codes (for example `@badgegate/auth`) keep the same pattern.
 *
 * @module @badgegate/core/error-codes
 */

// ============================================================================
// Categories
// ============================================================================

export const DatabaseErrorCodes = {
  DB_CONNECTION_FAILED: 'DB_CONNECTION_FAILED',
  DB_QUERY_FAILED: 'DB_QUERY_FAILED',
  DB_TRANSACTION_FAILED: 'DB_TRANSACTION_FAILED',
  DB_UNKNOWN: 'DB_UNKNOWN'
} as const

export const ValidationErrorCodes = {
  VALIDATION_UNIQUE_VIOLATION: 'VALIDATION_UNIQUE_VIOLATION',
  VALIDATION_FOREIGN_KEY_VIOLATION: 'VALIDATION_FOREIGN_KEY_VIOLATION',
  VALIDATION_NOT_NULL_VIOLATION: 'VALIDATION_NOT_NULL_VIOLATION',
  VALIDATION_CHECK_VIOLATION: 'VALIDATION_CHECK_VIOLATION',
  VALIDATION_INVALID_INPUT: 'VALIDATION_INVALID_INPUT'
} as const

export const ResourceErrorCodes = {
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',
  RESOURCE_MULTIPLE_FOUND: 'RESOURCE_MULTIPLE_FOUND'
} as const

export const SessionErrorCodes = {
  SESSION_CLOSED: 'SESSION_CLOSED',
  SESSION_NOT_ACTIVE: 'SESSION_NOT_ACTIVE'
} as const

export const ConfigErrorCodes = {
  CONFIG_VALIDATION_FAILED: 'CONFIG_VALIDATION_FAILED',
  CONFIG_UNSUPPORTED_OPTION: 'CONFIG_UNSUPPORTED_OPTION'
} as const

/**
 * Every code known to `@badgegate/core`.
 */
export const ErrorCodes = {
  ...DatabaseErrorCodes,
  ...ValidationErrorCodes,
  ...ResourceErrorCodes,
  ...SessionErrorCodes,
  ...ConfigErrorCodes
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

/**
 * Extract the category prefix of an error code.
 *
 * @example
 * ```typescript
 * getErrorCategory('VALIDATION_NOT_NULL_VIOLATION') // 'VALIDATION'
 * getErrorCategory('BADGE_ACCESS_DENIED')           // 'BADGE'
 * ```
 */
export function getErrorCategory(code: string): string {
  const separator = code.indexOf('_')
  return separator === -1 ? code : code.slice(0, separator)
}
