import BetterSqlite3 from 'better-sqlite3'
import {
  DummyDriver,
  Kysely,
  SqliteAdapter,
  SqliteDialect,
  SqliteIntrospector,
  SqliteQueryCompiler,
  type Generated
} from 'kysely'

export interface TestDatabase {
  data: { id: Generated<number>; owner: number; data: string; secret: string | null }
  data2: { id: Generated<number>; owner: number | null; data: string }
  company: { id: Generated<number>; name: string }
  user: { id: Generated<number>; name: string; company_id: number }
  widget: { id: Generated<number>; name: string; company_id: number }
}

/**
 * Kysely instance that compiles SQLite statements but never runs them.
 */
export function createColdDb<DB = TestDatabase>(): Kysely<DB> {
  return new Kysely<DB>({
    dialect: {
      createAdapter: () => new SqliteAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: db => new SqliteIntrospector(db),
      createQueryCompiler: () => new SqliteQueryCompiler()
    }
  })
}

/**
 * Fresh in-memory SQLite database with the test schema.
 *
 * SQLite has one connection: while a session's transaction is open, every
 * query must go through that session.
 */
export async function createTestDb(): Promise<Kysely<TestDatabase>> {
  const db = new Kysely<TestDatabase>({
    dialect: new SqliteDialect({ database: new BetterSqlite3(':memory:') })
  })

  await db.schema
    .createTable('data')
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('owner', 'integer')
    .addColumn('data', 'text')
    .addColumn('secret', 'text')
    .execute()

  await db.schema
    .createTable('data2')
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('owner', 'integer')
    .addColumn('data', 'text')
    .execute()

  await db.schema
    .createTable('company')
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', col => col.notNull().unique())
    .execute()

  await db.schema
    .createTable('user')
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('name', 'text')
    .addColumn('company_id', 'integer', col => col.references('company.id'))
    .execute()

  await db.schema
    .createTable('widget')
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('name', 'text')
    .addColumn('company_id', 'integer', col => col.references('company.id'))
    .execute()

  return db
}

/**
 * Six rows: owner 1 has one, owner 2 has two, owner 3 has three.
 *
 * | id | owner | data | secret |
 * |----|-------|------|--------|
 * | 1  | 1     | A    | s1     |
 * | 2  | 2     | A    | s2     |
 * | 3  | 2     | B    | s3     |
 * | 4  | 3     | A    | s4     |
 * | 5  | 3     | B    | s5     |
 * | 6  | 3     | C    | s6     |
 */
export async function seedData(db: Kysely<TestDatabase>): Promise<void> {
  await db
    .insertInto('data')
    .values([
      { owner: 1, data: 'A', secret: 's1' },
      { owner: 2, data: 'A', secret: 's2' },
      { owner: 2, data: 'B', secret: 's3' },
      { owner: 3, data: 'A', secret: 's4' },
      { owner: 3, data: 'B', secret: 's5' },
      { owner: 3, data: 'C', secret: 's6' }
    ])
    .execute()
}

/**
 * Companies A, B, C (ids 1-3); users 1a, 2a, 2b, 3a, 3b, 3c (ids 1-6);
 * widgets A1, A2 of company 1 and B1, B2 of company 2.
 */
export async function seedCompanies(db: Kysely<TestDatabase>): Promise<void> {
  await db.insertInto('company').values([{ name: 'A' }, { name: 'B' }, { name: 'C' }]).execute()
  await db
    .insertInto('user')
    .values([
      { company_id: 1, name: 'a' },
      { company_id: 2, name: 'a' },
      { company_id: 2, name: 'b' },
      { company_id: 3, name: 'a' },
      { company_id: 3, name: 'b' },
      { company_id: 3, name: 'c' }
    ])
    .execute()
  await db
    .insertInto('widget')
    .values([
      { company_id: 1, name: 'widgetA1' },
      { company_id: 1, name: 'widgetA2' },
      { company_id: 2, name: 'widgetB1' },
      { company_id: 2, name: 'widgetB2' }
    ])
    .execute()
}
