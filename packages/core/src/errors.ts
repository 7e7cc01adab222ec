/**
 * Database error hierarchy with multi-database support
 *
 * All errors carry a code from {@link ErrorCodes} (or a package-specific code
 * following the same pattern) and serialize through `toJSON()`.
 */

import { ErrorCodes } from './error-codes.js'
import type { Dialect } from './types.js'

const PG_KEY_REGEX = /Key \(([^)]+)\)=/
const PG_TABLE_REGEX = /table "(.+?)"/
const MYSQL_DUP_REGEX = /Duplicate entry '(.+?)' for key '(.+?)'/
const MYSQL_COLUMN_REGEX = /Column '(.+?)' cannot be null/
const MYSQL_FIELD_REGEX = /Field '(.+?)' doesn't have a default value/
const MYSQL_KEY_COLUMN_REGEX = /(?:^|\.)([^.]+)$/
const SQLITE_UNIQUE_REGEX = /UNIQUE constraint failed: (\w+)\.(\w+)/
const SQLITE_NOT_NULL_REGEX = /NOT NULL constraint failed: (\w+)\.(\w+)/
const SQLITE_CHECK_REGEX = /CHECK constraint failed: (\w+)/

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly detail?: string
  ) {
    super(message)
    this.name = 'DatabaseError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      detail: this.detail
    }
  }
}

export class UniqueConstraintError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table: string,
    public readonly columns: string[]
  ) {
    super(`UNIQUE constraint violation on ${table}`, ErrorCodes.VALIDATION_UNIQUE_VIOLATION)
    this.name = 'UniqueConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table,
      columns: this.columns
    }
  }
}

export class ForeignKeyError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table: string,
    public readonly referencedTable: string
  ) {
    super('FOREIGN KEY constraint violation', ErrorCodes.VALIDATION_FOREIGN_KEY_VIOLATION)
    this.name = 'ForeignKeyError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table,
      referencedTable: this.referencedTable
    }
  }
}

export class NotNullError extends DatabaseError {
  constructor(
    public readonly column: string,
    public readonly table?: string
  ) {
    const tableInfo = table ? ` on table ${table}` : ''
    super(
      `NOT NULL constraint violation on column ${column}${tableInfo}`,
      ErrorCodes.VALIDATION_NOT_NULL_VIOLATION,
      column
    )
    this.name = 'NotNullError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      column: this.column,
      table: this.table
    }
  }
}

export class CheckConstraintError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table?: string
  ) {
    const tableInfo = table ? ` on table ${table}` : ''
    super(
      `CHECK constraint violation: ${constraint}${tableInfo}`,
      ErrorCodes.VALIDATION_CHECK_VIOLATION
    )
    this.name = 'CheckConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table
    }
  }
}

/**
 * Thrown when a query expected to produce a row produced none.
 */
export class NotFoundError extends DatabaseError {
  constructor(entity: string, filters?: Record<string, unknown>) {
    const detail = filters ? JSON.stringify(filters) : undefined
    super(`${entity} not found`, ErrorCodes.RESOURCE_NOT_FOUND, detail)
    this.name = 'NotFoundError'
  }
}

/**
 * Thrown when a query expected to produce exactly one row produced several.
 */
export class MultipleResultsError extends DatabaseError {
  constructor(
    entity: string,
    public readonly count: number
  ) {
    super(`Expected one ${entity}, found ${count}`, ErrorCodes.RESOURCE_MULTIPLE_FOUND)
    this.name = 'MultipleResultsError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      count: this.count
    }
  }
}

/**
 * Thrown by any session operation after the session was closed.
 */
export class SessionClosedError extends DatabaseError {
  constructor(operation: string) {
    super(`Cannot ${operation}: session is closed`, ErrorCodes.SESSION_CLOSED, operation)
    this.name = 'SessionClosedError'
  }
}

/**
 * Driver error shape shared by pg, mysql2 and better-sqlite3.
 * @internal
 */
interface RawDatabaseError {
  code?: string
  message?: string
  detail?: string
  constraint?: string
  table?: string
  column?: string
  sqlMessage?: string
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key)
  return typeof value === 'string' ? value : undefined
}

function toRawError(error: object): RawDatabaseError {
  const raw: RawDatabaseError = {}
  for (const key of ['code', 'message', 'detail', 'constraint', 'table', 'column', 'sqlMessage'] as const) {
    const value = readString(error, key)
    if (value !== undefined) {
      raw[key] = value
    }
  }
  return raw
}

function parsePostgresError(dbError: RawDatabaseError): DatabaseError {
  switch (dbError.code) {
    case '23505': {
      const keyMatch = dbError.detail ? PG_KEY_REGEX.exec(dbError.detail) : null
      const columns = keyMatch?.[1] ? keyMatch[1].split(',').map(col => col.trim()) : []
      return new UniqueConstraintError(
        dbError.constraint ?? 'unique',
        dbError.table ?? 'unknown',
        columns
      )
    }
    case '23503': {
      const tableMatch = dbError.detail ? PG_TABLE_REGEX.exec(dbError.detail) : null
      return new ForeignKeyError(
        dbError.constraint ?? 'foreign_key',
        dbError.table ?? 'unknown',
        tableMatch?.[1] ?? 'unknown'
      )
    }
    case '23502':
      return new NotNullError(dbError.column ?? 'unknown', dbError.table)
    case '23514':
      return new CheckConstraintError(dbError.constraint ?? 'unknown', dbError.table)
    default:
      return new DatabaseError(dbError.message ?? 'Database error', dbError.code ?? ErrorCodes.DB_UNKNOWN)
  }
}

function parseMySQLError(dbError: RawDatabaseError): DatabaseError {
  switch (dbError.code) {
    case 'ER_DUP_ENTRY':
    case 'ER_DUP_KEY': {
      const dupMatch = dbError.sqlMessage ? MYSQL_DUP_REGEX.exec(dbError.sqlMessage) : null
      const key = dupMatch?.[2] ?? 'unique'
      const column = MYSQL_KEY_COLUMN_REGEX.exec(key)?.[1]
      return new UniqueConstraintError(key, 'unknown', column ? [column] : [])
    }
    case 'ER_NO_REFERENCED_ROW':
    case 'ER_NO_REFERENCED_ROW_2':
    case 'ER_ROW_IS_REFERENCED':
    case 'ER_ROW_IS_REFERENCED_2':
      return new ForeignKeyError('foreign_key', 'unknown', 'unknown')
    case 'ER_BAD_NULL_ERROR': {
      const nullMatch = dbError.sqlMessage ? MYSQL_COLUMN_REGEX.exec(dbError.sqlMessage) : null
      return new NotNullError(nullMatch?.[1] ?? 'unknown')
    }
    case 'ER_NO_DEFAULT_FOR_FIELD': {
      const fieldMatch = dbError.sqlMessage ? MYSQL_FIELD_REGEX.exec(dbError.sqlMessage) : null
      return new NotNullError(fieldMatch?.[1] ?? 'unknown')
    }
    default:
      return new DatabaseError(
        dbError.sqlMessage ?? dbError.message ?? 'Database error',
        dbError.code ?? ErrorCodes.DB_UNKNOWN
      )
  }
}

function parseSQLiteError(message: string): DatabaseError {
  if (message.includes('UNIQUE constraint failed')) {
    const match = SQLITE_UNIQUE_REGEX.exec(message)
    return new UniqueConstraintError('unique', match?.[1] ?? 'unknown', match?.[2] ? [match[2]] : [])
  }
  if (message.includes('FOREIGN KEY constraint failed')) {
    return new ForeignKeyError('foreign_key', 'unknown', 'unknown')
  }
  if (message.includes('NOT NULL constraint failed')) {
    const match = SQLITE_NOT_NULL_REGEX.exec(message)
    return new NotNullError(match?.[2] ?? 'unknown', match?.[1])
  }
  if (message.includes('CHECK constraint failed')) {
    const match = SQLITE_CHECK_REGEX.exec(message)
    return new CheckConstraintError(match?.[1] ?? 'unknown')
  }
  return new DatabaseError(message, ErrorCodes.DB_UNKNOWN)
}

/**
 * Translate a driver error into the {@link DatabaseError} hierarchy.
 *
 * Errors that already belong to the hierarchy are returned unchanged, so the
 * function is safe to apply more than once on the same error path.
 */
export function parseDatabaseError(error: unknown, dialect: Dialect = 'postgres'): DatabaseError {
  if (error instanceof DatabaseError) {
    return error
  }
  if (!error || typeof error !== 'object' || Array.isArray(error)) {
    return new DatabaseError('Unknown database error', ErrorCodes.DB_UNKNOWN)
  }

  const dbError = toRawError(error)
  const generic = (): DatabaseError =>
    new DatabaseError(dbError.message ?? 'Database error', dbError.code ?? ErrorCodes.DB_UNKNOWN)

  switch (dialect) {
    case 'postgres':
      return dbError.code ? parsePostgresError(dbError) : generic()
    case 'mysql':
      return dbError.code ? parseMySQLError(dbError) : generic()
    case 'sqlite':
      return parseSQLiteError(dbError.message ?? '')
    default:
      return generic()
  }
}
