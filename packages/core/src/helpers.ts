/**
 * Read an environment variable.
 *
 * Returns `undefined` outside of a runtime that exposes `process.env`.
 *
 * @example
 * ```typescript
 * const debug = getEnv('BADGEGATE_DEBUG');
 * ```
 */
export function getEnv(key: string): string | undefined {
  if (globalThis.process?.env) {
    return globalThis.process.env[key]
  }
  return undefined
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])

/**
 * Read an environment variable as a boolean flag (`1`, `true`, `yes`, `on`).
 */
export function getEnvFlag(key: string): boolean {
  const value = getEnv(key)
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase())
}
