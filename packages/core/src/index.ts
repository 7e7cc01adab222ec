/**
 * @badgegate/core - shared building blocks for badgegate packages
 *
 * - Error handling (DatabaseError hierarchy, error codes, driver error parsing)
 * - Logger interface and default loggers
 * - Environment access
 * - Dialect detection
 *
 * @module @badgegate/core
 */

// Error handling
export * from './errors.js'
export * from './error-codes.js'

// Dialect detection
export * from './dialect-detection.js'

// Helpers
export * from './helpers.js'

// Types
export * from './types.js'

// Logger
export * from './logger.js'
