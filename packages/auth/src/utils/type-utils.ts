/**
 * Type utilities for dynamic tables
 *
 * Entities name their tables at runtime (`static tableName`), so the session
 * cannot give Kysely a compile-time table name. These wrappers are the single
 * boundary where the session's queries leave Kysely's schema typing.
 *
 * NOTE: This file intentionally uses `any` types to bridge the gap between
 * Kysely's compile-time type system and runtime table names. Table names come
 * from registered entity classes; column names come from entity fields or the
 * rows the database returned.
 *
 * @module @badgegate/auth/utils/type-utils
 */

/* eslint-disable @typescript-eslint/no-explicit-any */

import type {
  DeleteQueryBuilder,
  DeleteResult,
  InsertQueryBuilder,
  InsertResult,
  Kysely,
  SelectQueryBuilder,
  UpdateQueryBuilder,
  UpdateResult
} from 'kysely'

/**
 * Schema type used for every table the session addresses by name.
 */
export type DynamicDatabase = Record<string, Record<string, unknown>>

export type DynamicRow = Record<string, unknown>

export type DynamicSelect = SelectQueryBuilder<DynamicDatabase, string, DynamicRow>

export type DynamicUpdate = UpdateQueryBuilder<DynamicDatabase, string, string, UpdateResult>

export type DynamicDelete = DeleteQueryBuilder<DynamicDatabase, string, DeleteResult>

export type DynamicInsert = InsertQueryBuilder<DynamicDatabase, string, InsertResult>

/**
 * `select * from <table>` against a runtime table name.
 *
 * @param db - Kysely instance or transaction (plugins included)
 * @param table - Table name (from a registered entity)
 */
export function selectFromDynamicTable<DB>(db: Kysely<DB>, table: string): DynamicSelect {
  return (db as any).selectFrom(table).selectAll()
}

export type DynamicCount = SelectQueryBuilder<DynamicDatabase, string, { count: string | number | bigint }>

/**
 * `select count(*) as "count" from <table>` against a runtime table name.
 */
export function countFromDynamicTable<DB>(db: Kysely<DB>, table: string): DynamicCount {
  return (db as any).selectFrom(table).select((eb: any) => eb.fn.countAll().as('count'))
}

/**
 * `update <table> set ...` against a runtime table name.
 */
export function updateDynamicTable<DB>(db: Kysely<DB>, table: string, values: DynamicRow): DynamicUpdate {
  return (db as any).updateTable(table).set(values)
}

/**
 * `delete from <table>` against a runtime table name.
 */
export function deleteFromDynamicTable<DB>(db: Kysely<DB>, table: string): DynamicDelete {
  return (db as any).deleteFrom(table)
}

/**
 * `insert into <table> ...` against a runtime table name.
 */
export function insertIntoDynamicTable<DB>(db: Kysely<DB>, table: string, values: DynamicRow): DynamicInsert {
  return (db as any).insertInto(table).values(values)
}

/**
 * Copy the enumerable own fields of a driver row into a plain record.
 */
export function toDynamicRow(row: object): DynamicRow {
  return Object.fromEntries(Object.entries(row))
}
