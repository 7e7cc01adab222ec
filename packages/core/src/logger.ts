import { getEnvFlag } from './helpers.js'

/**
 * Logging interface shared by badgegate packages.
 *
 * Any logging library can sit behind it (pino, winston, bunyan); the
 * packages only ever call these six methods.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import type { BadgeLogger } from '@badgegate/core'
 *
 * const log = pino()
 * const logger: BadgeLogger = {
 *   trace: (msg, ...args) => log.trace({ args }, msg),
 *   debug: (msg, ...args) => log.debug({ args }, msg),
 *   info: (msg, ...args) => log.info({ args }, msg),
 *   warn: (msg, ...args) => log.warn({ args }, msg),
 *   error: (msg, ...args) => log.error({ args }, msg),
 *   fatal: (msg, ...args) => log.fatal({ args }, msg)
 * }
 *
 * const session = await createAuthSession({ db, entities, logger })
 * ```
 */
export interface BadgeLogger {
  trace(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  fatal(message: string, ...args: unknown[]): void
}

/**
 * Console logger. Every line is prefixed with `[badgegate:<level>]`.
 *
 * `trace` goes to `console.debug`, `fatal` to `console.error` with a `FATAL:` marker.
 */
export const consoleLogger: BadgeLogger = {
  trace: (msg, ...args) => console.debug(`[badgegate:trace] ${msg}`, ...args),
  debug: (msg, ...args) => console.debug(`[badgegate:debug] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[badgegate:info] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[badgegate:warn] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[badgegate:error] ${msg}`, ...args),
  fatal: (msg, ...args) => console.error(`[badgegate:fatal] FATAL: ${msg}`, ...args)
}

function discard(): void {
  // no-op sink
}

/**
 * Logger that discards everything. Default for every component that logs.
 */
export const silentLogger: BadgeLogger = {
  trace: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  fatal: discard
}

/**
 * Wrap a logger so every message starts with `[prefix]`.
 *
 * @example
 * ```typescript
 * const log = createPrefixedLogger('filter', consoleLogger)
 * log.warn('raw statement passed through')
 * // [badgegate:warn] [filter] raw statement passed through
 * ```
 */
export function createPrefixedLogger(prefix: string, baseLogger: BadgeLogger = consoleLogger): BadgeLogger {
  return {
    trace: (msg, ...args) => baseLogger.trace(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => baseLogger.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => baseLogger.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => baseLogger.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => baseLogger.error(`[${prefix}] ${msg}`, ...args),
    fatal: (msg, ...args) => baseLogger.fatal(`[${prefix}] ${msg}`, ...args)
  }
}

/**
 * Environment variable that turns on console logging when no logger is passed.
 */
export const DEBUG_ENV_VAR = 'BADGEGATE_DEBUG'

/**
 * Pick the logger a component should use: the one it was given, otherwise
 * {@link consoleLogger} when `BADGEGATE_DEBUG` is set, otherwise {@link silentLogger}.
 */
export function resolveLogger(logger?: BadgeLogger): BadgeLogger {
  if (logger) {
    return logger
  }
  return getEnvFlag(DEBUG_ENV_VAR) ? consoleLogger : silentLogger
}
