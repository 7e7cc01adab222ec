import type { Kysely } from 'kysely'
import { sql } from 'kysely'
import type { Dialect } from './types.js'

const MARKER = '_badgegate_marker'

const ADAPTER_PATTERNS: ReadonlyArray<readonly [string, Dialect]> = [
  ['sqlite', 'sqlite'],
  ['mysql', 'mysql'],
  ['mssql', 'mssql'],
  ['postgres', 'postgres']
]

/**
 * Detects the database dialect of a Kysely instance or transaction.
 *
 * **Detection strategy:**
 * 1. The class name of the dialect adapter (`SqliteAdapter`, `MysqlAdapter`, ...)
 * 2. Identifier quoting of a compiled marker statement
 *    - Backticks `` `t` `` → mysql
 *    - Square brackets `[t]` → mssql
 *    - Double quotes `"t"` → postgres (sqlite quotes the same way, which is why
 *      the adapter is checked first)
 * 3. `postgres` when neither is conclusive
 *
 * Call it on the unfiltered instance: the marker is compiled through the
 * instance's plugins.
 *
 * @example
 * ```typescript
 * const db = new Kysely<Database>({ dialect: new SqliteDialect({ database }) })
 * detectDialect(db) // 'sqlite'
 * ```
 */
export function detectDialect<DB>(executor: Kysely<DB>): Dialect {
  const adapterName = executor.getExecutor().adapter.constructor.name.toLowerCase()
  for (const [pattern, dialect] of ADAPTER_PATTERNS) {
    if (adapterName.includes(pattern)) {
      return dialect
    }
  }

  const compiled = sql`select 1 from ${sql.table(MARKER)}`.compile(executor)
  if (compiled.sql.includes(`\`${MARKER}\``)) {
    return 'mysql'
  }
  if (compiled.sql.includes(`[${MARKER}]`)) {
    return 'mssql'
  }
  return 'postgres'
}
