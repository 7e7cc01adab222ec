/**
 * Auth Session
 *
 * A unit of work over one Kysely controlled transaction. Queries built on
 * {@link AuthSession.db} go through the badge filter plugin; the session's own
 * writes (the inserts and updates of `flush()`) go through {@link AuthSession.rawDb}.
 *
 * @module @badgegate/auth/session
 */

import type { CompiledQuery, Compilable, ControlledTransaction, Kysely } from 'kysely'
import { z } from 'zod'
import {
  DatabaseError,
  ErrorCodes,
  MultipleResultsError,
  NotFoundError,
  SessionClosedError,
  createPrefixedLogger,
  detectDialect,
  parseDatabaseError,
  resolveLogger,
  type BadgeLogger,
  type Dialect
} from '@badgegate/core'
import { ALLOW, describeBadge, isActor, isDeny, type Badge } from '../badge.js'
import { BadgeContext, type BadgeScope } from '../context/badge-context.js'
import { AuthBase, primaryKeyOf, type EntityType } from '../entity/auth-base.js'
import { EntityRegistry } from '../entity/registry.js'
import { bindInstance, publicFields, readRaw, unbindInstance, writeRaw, type SessionBinding, type UnitOfWork } from '../gate/state.js'
import { BadgeFilterPlugin } from '../plugin.js'
import { conditionsExpression, type ColumnQualifier } from '../query/predicates.js'
import { AccessDeniedError, IncompleteRowError, UnregisteredEntityError, UnsupportedConfigurationError } from '../errors.js'
import {
  countFromDynamicTable,
  deleteFromDynamicTable,
  insertIntoDynamicTable,
  selectFromDynamicTable,
  toDynamicRow,
  updateDynamicTable,
  type DynamicDatabase,
  type DynamicRow,
  type DynamicSelect
} from '../utils/type-utils.js'

/**
 * Serializable session options.
 */
export const AuthSessionOptionsSchema = z.object({
  cacheStatements: z.boolean().optional(),
  dialect: z.enum(['postgres', 'mysql', 'sqlite', 'mssql']).optional()
})

export type AuthSessionConfig = z.infer<typeof AuthSessionOptionsSchema>

export interface AuthSessionOptions<DB = DynamicDatabase, TActor = unknown> extends AuthSessionConfig {
  /** Database the session opens its transactions on */
  db: Kysely<DB>
  /** Entity classes the session loads and filters */
  entities: EntityRegistry | Iterable<EntityType>
  /** Initial badge, Allow when omitted */
  badge?: Badge<TActor>
  logger?: BadgeLogger
}

/**
 * Equality conditions keyed by column, as accepted by the query helpers.
 */
export type Conditions = Readonly<Record<string, unknown>>

/**
 * Anything `load()` can run: a select query builder, usually.
 */
export interface Executable {
  execute(): Promise<readonly object[]>
}

type InstanceState = 'pending' | 'persistent'

function tableReference(entity: EntityType): string {
  return entity.schema ? `${entity.schema}.${entity.tableName}` : entity.tableName
}

function qualifierOf(entity: EntityType): ColumnQualifier {
  return { reference: entity.tableName, table: entity.tableName, schema: entity.schema, aliased: false }
}

function identityKey(entity: EntityType, id: unknown): string {
  return `${tableReference(entity)}:${String(id)}`
}

function validateOptions(config: AuthSessionConfig): AuthSessionConfig {
  const result = AuthSessionOptionsSchema.safeParse(config)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new DatabaseError(`Invalid session options: ${issues}`, ErrorCodes.CONFIG_VALIDATION_FAILED, issues)
  }
  if (result.data.cacheStatements) {
    throw new UnsupportedConfigurationError(
      'cacheStatements',
      'compiled statements depend on the badge that was current when they were compiled'
    )
  }
  return result.data
}

/**
 * Open a session and its first transaction.
 *
 * @example
 * ```typescript
 * const session = await createAuthSession<DB, number>({ db, entities: [Data], badge: 1 })
 *
 * const rows = await session.all(Data)      // only rows owned by 1
 * session.add(Data.build({ data: 'new' }))  // owner stamped to 1
 * await session.commit()
 * await session.close()
 * ```
 */
export async function createAuthSession<DB = DynamicDatabase, TActor = unknown>(
  options: AuthSessionOptions<DB, TActor>
): Promise<AuthSession<DB, TActor>> {
  const config = validateOptions({ cacheStatements: options.cacheStatements, dialect: options.dialect })
  const registry =
    options.entities instanceof EntityRegistry ? options.entities : new EntityRegistry(options.entities)
  const context = new BadgeContext<TActor>(options.badge ?? ALLOW)
  const logger = resolveLogger(options.logger)
  const plugin = new BadgeFilterPlugin<TActor>({ context, entities: registry, logger })

  const session = new AuthSession<DB, TActor>(
    options.db.withPlugin(plugin),
    registry,
    context,
    config.dialect ?? detectDialect(options.db),
    createPrefixedLogger('session', logger)
  )
  await session.begin()
  return session
}

/**
 * Unit of work with a badge.
 *
 * Instances loaded through the session are bound to it: gated instances check
 * their attributes against the session's badge while the session holds them
 * and a transaction is open. `commit()` and `rollback()` start the next
 * transaction right away; `close()` ends the session.
 *
 * There is no autoflush. Queries see pending instances only after `flush()`.
 */
export class AuthSession<DB = DynamicDatabase, TActor = unknown> implements UnitOfWork {
  readonly binding: SessionBinding

  private trx: ControlledTransaction<DB> | undefined
  private closed = false
  private readonly states = new Map<AuthBase, InstanceState>()
  private readonly identityMap = new Map<string, AuthBase>()
  /** Identity of every instance that was persistent at some point; survives expunge */
  private readonly identities = new WeakMap<AuthBase, string>()
  private readonly snapshots = new WeakMap<AuthBase, DynamicRow>()
  private readonly insertedInTransaction = new Set<AuthBase>()

  /**
   * @internal Use {@link createAuthSession}.
   */
  constructor(
    private readonly filteredDb: Kysely<DB>,
    readonly registry: EntityRegistry,
    readonly context: BadgeContext<TActor>,
    readonly dialect: Dialect,
    private readonly logger: BadgeLogger
  ) {
    this.binding = { context, unitOfWork: this }
  }

  // ============================================================================
  // Transaction lifecycle
  // ============================================================================

  /**
   * @internal Open the next transaction. Called by {@link createAuthSession},
   * `commit()` and `rollback()`.
   */
  async begin(): Promise<void> {
    this.assertOpen('begin')
    if (this.trx) {
      return
    }
    try {
      this.trx = await this.filteredDb.startTransaction().execute()
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }
    this.logger.debug('begin')
  }

  get isActive(): boolean {
    return !this.closed && this.trx !== undefined
  }

  get isClosed(): boolean {
    return this.closed
  }

  contains(instance: object): boolean {
    return instance instanceof AuthBase && this.states.has(instance)
  }

  /**
   * Write pending inserts and changed persistent instances. Fails under the
   * Deny badge when there is something to write.
   */
  async flush(): Promise<void> {
    const trx = this.requireTransaction('flush')

    const inserts: AuthBase[] = []
    const updates: Array<[AuthBase, DynamicRow, DynamicRow]> = []
    for (const [instance, state] of this.states) {
      if (state === 'pending') {
        inserts.push(instance)
        continue
      }
      const current = this.snapshot(instance)
      const changes = this.changesOf(instance, current)
      if (Object.keys(changes).length > 0) {
        updates.push([instance, changes, current])
      }
    }

    if (inserts.length === 0 && updates.length === 0) {
      return
    }
    if (isDeny(this.context.badge)) {
      throw new AccessDeniedError('flush')
    }

    const raw = trx.withoutPlugins()
    for (const instance of inserts) {
      await this.insert(raw, instance)
    }
    for (const [instance, changes, current] of updates) {
      await this.write(raw, instance, changes, current)
    }
    this.logger.debug('flush', { inserted: inserts.length, updated: updates.length })
  }

  /**
   * Flush, commit, and open the next transaction.
   */
  async commit(): Promise<void> {
    const trx = this.requireTransaction('commit')
    await this.flush()
    try {
      await trx.commit().execute()
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }
    this.trx = undefined
    this.insertedInTransaction.clear()
    this.logger.debug('commit')
    await this.begin()
  }

  /**
   * Roll back, detach every instance, and open the next transaction.
   */
  async rollback(): Promise<void> {
    this.requireTransaction('rollback')
    await this.endTransaction()
    this.logger.debug('rollback')
    await this.begin()
  }

  /**
   * Roll back and release the connection. Every later operation throws
   * `SessionClosedError`.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    try {
      await this.endTransaction()
    } finally {
      this.closed = true
    }
    this.logger.debug('close')
  }

  // ============================================================================
  // Badge
  // ============================================================================

  get badge(): Badge<TActor> {
    return this.context.badge
  }

  set badge(badge: Badge<TActor>) {
    this.context.badge = badge
  }

  /**
   * Install `badge` until the returned scope is released. Without an argument
   * the session runs unrestricted.
   *
   * @example
   * ```typescript
   * const scope = session.switchBadge()
   * try {
   *   await session.all(Data) // every row
   * } finally {
   *   scope.release()
   * }
   * ```
   */
  switchBadge(badge: Badge<TActor> = ALLOW): BadgeScope<TActor> {
    return this.context.scoped(badge)
  }

  /**
   * Run `fn` under `badge` and restore the previous badge afterwards.
   */
  asBadge<T>(badge: Badge<TActor>, fn: () => Promise<T>): Promise<T> {
    return this.context.runAsync(badge, fn)
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /**
   * Filtered database bound to the current transaction.
   */
  get db(): Kysely<DB> {
    return this.requireTransaction('query')
  }

  /**
   * Unfiltered database bound to the current transaction.
   */
  get rawDb(): Kysely<DB> {
    return this.requireTransaction('query').withoutPlugins()
  }

  /**
   * `select * from <table of entity>` on the filtered database.
   */
  query(entity: EntityType): DynamicSelect {
    return selectFromDynamicTable(this.db, tableReference(entity))
  }

  /**
   * Execute `query` and turn its rows into instances of `entity`. Rows whose
   * identity is already in the session resolve to the instance held there.
   */
  async load<E extends AuthBase>(entity: EntityType<E>, query: Executable): Promise<E[]> {
    this.assertOpen('load')
    if (!this.registry.has(entity)) {
      throw new UnregisteredEntityError(entity.name)
    }
    const rows = await query.execute()
    return rows.map(row => this.materialize(entity, toDynamicRow(row)))
  }

  async all<E extends AuthBase>(entity: EntityType<E>, conditions?: Conditions): Promise<E[]> {
    return this.load(entity, this.where(this.query(entity), entity, conditions))
  }

  async first<E extends AuthBase>(entity: EntityType<E>, conditions?: Conditions): Promise<E | undefined> {
    const [instance] = await this.load(entity, this.where(this.query(entity), entity, conditions).limit(1))
    return instance
  }

  /**
   * Exactly one visible instance.
   *
   * @throws NotFoundError when no row is visible
   * @throws MultipleResultsError when more than one is
   */
  async one<E extends AuthBase>(entity: EntityType<E>, conditions?: Conditions): Promise<E> {
    const instances = await this.all(entity, conditions)
    const [instance] = instances
    if (!instance) {
      throw new NotFoundError(entity.name, conditions ? { ...conditions } : undefined)
    }
    if (instances.length > 1) {
      throw new MultipleResultsError(entity.name, instances.length)
    }
    return instance
  }

  /**
   * Visible instance with primary key `id`, if any.
   */
  async get<E extends AuthBase>(entity: EntityType<E>, id: unknown): Promise<E | undefined> {
    return this.first(entity, { [primaryKeyOf(entity)]: id })
  }

  async count(entity: EntityType, conditions?: Conditions): Promise<number> {
    let query = countFromDynamicTable(this.db, tableReference(entity))
    const predicate = conditions ? conditionsExpression(conditions, qualifierOf(entity)) : undefined
    if (predicate) {
      query = query.where(predicate)
    }
    const row = await query.executeTakeFirstOrThrow()
    return Number(row.count)
  }

  /**
   * Bulk update through the filter. Instances already loaded are not refreshed.
   *
   * @returns number of rows updated
   */
  async update(entity: EntityType, values: DynamicRow, conditions?: Conditions): Promise<number> {
    let query = updateDynamicTable(this.db, tableReference(entity), values)
    const predicate = conditions ? conditionsExpression(conditions, qualifierOf(entity)) : undefined
    if (predicate) {
      query = query.where(predicate)
    }
    const result = await query.executeTakeFirst()
    return Number(result.numUpdatedRows)
  }

  /**
   * Bulk delete through the filter. Instances already loaded are not detached.
   *
   * @returns number of rows deleted
   */
  async delete(entity: EntityType, conditions?: Conditions): Promise<number> {
    let query = deleteFromDynamicTable(this.db, tableReference(entity))
    const predicate = conditions ? conditionsExpression(conditions, qualifierOf(entity)) : undefined
    if (predicate) {
      query = query.where(predicate)
    }
    const result = await query.executeTakeFirst()
    return Number(result.numDeletedRows)
  }

  /**
   * Compile `query` under the current badge without running it.
   */
  render(query: Compilable): CompiledQuery {
    this.assertOpen('render')
    return query.compile()
  }

  // ============================================================================
  // Instances
  // ============================================================================

  /**
   * Stage a new instance for insertion, or re-attach one that was expunged.
   *
   * A new instance is stamped with `addAuthInsertData(badge)` under an actor
   * badge, exactly once. Under the Deny badge it is not staged at all.
   */
  add(instance: AuthBase): void {
    this.assertOpen('add')
    if (this.states.has(instance)) {
      return
    }
    const entity = this.registry.forInstance(instance)

    const known = this.identities.get(instance)
    if (known !== undefined) {
      this.identityMap.set(known, instance)
      this.states.set(instance, 'persistent')
      bindInstance(instance, this.binding)
      return
    }

    const badge = this.context.badge
    if (isDeny(badge)) {
      throw new AccessDeniedError('insert')
    }
    if (isActor(badge)) {
      instance.addAuthInsertData(badge)
    }
    this.states.set(instance, 'pending')
    this.logger.debug(`add ${entity.name}`, { badge: describeBadge(badge) })
  }

  /**
   * Remove `instance` from the session. Its attributes stop being checked.
   */
  expunge(instance: AuthBase): void {
    this.assertOpen('expunge')
    this.detach(instance)
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation)
    }
  }

  private requireTransaction(operation: string): ControlledTransaction<DB> {
    this.assertOpen(operation)
    if (!this.trx) {
      throw new DatabaseError(`Cannot ${operation}: no transaction is open`, ErrorCodes.SESSION_NOT_ACTIVE, operation)
    }
    return this.trx
  }

  private async endTransaction(): Promise<void> {
    const trx = this.trx
    this.trx = undefined
    try {
      if (trx) {
        await trx.rollback().execute()
      }
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    } finally {
      for (const instance of this.insertedInTransaction) {
        this.identities.delete(instance)
        this.snapshots.delete(instance)
      }
      this.insertedInTransaction.clear()
      for (const instance of [...this.states.keys()]) {
        this.detach(instance)
      }
      this.identityMap.clear()
    }
  }

  private detach(instance: AuthBase): void {
    this.states.delete(instance)
    const key = this.identities.get(instance)
    if (key !== undefined && this.identityMap.get(key) === instance) {
      this.identityMap.delete(key)
    }
    unbindInstance(instance)
  }

  private where(query: DynamicSelect, entity: EntityType, conditions?: Conditions): DynamicSelect {
    const predicate = conditions ? conditionsExpression(conditions, qualifierOf(entity)) : undefined
    return predicate ? query.where(predicate) : query
  }

  private materialize<E extends AuthBase>(entity: EntityType<E>, row: DynamicRow): E {
    const primaryKey = primaryKeyOf(entity)
    const id = row[primaryKey]
    if (id === undefined || id === null) {
      throw new IncompleteRowError(entity.tableName, primaryKey)
    }

    const key = identityKey(entity, id)
    const existing = this.identityMap.get(key)
    if (existing instanceof entity) {
      return existing
    }

    const instance = new entity()
    for (const [column, value] of Object.entries(row)) {
      writeRaw(instance, column, value)
    }
    this.track(instance, key)
    bindInstance(instance, this.binding)
    return instance
  }

  private track(instance: AuthBase, key: string): void {
    this.identityMap.set(key, instance)
    this.identities.set(instance, key)
    this.states.set(instance, 'persistent')
    this.snapshots.set(instance, this.snapshot(instance))
  }

  private columnsOf(instance: AuthBase): readonly string[] {
    return this.registry.forInstance(instance).columns ?? publicFields(instance)
  }

  private snapshot(instance: AuthBase): DynamicRow {
    return Object.fromEntries(this.columnsOf(instance).map(column => [column, readRaw(instance, column)]))
  }

  private changesOf(instance: AuthBase, current: DynamicRow): DynamicRow {
    const previous = this.snapshots.get(instance) ?? {}
    const changes: DynamicRow = {}
    for (const [column, value] of Object.entries(current)) {
      if (!Object.is(value, previous[column])) {
        changes[column] = value
      }
    }
    return changes
  }

  private async insert(raw: Kysely<DB>, instance: AuthBase): Promise<void> {
    const entity = this.registry.forInstance(instance)
    const primaryKey = primaryKeyOf(entity)
    const values = Object.fromEntries(
      Object.entries(this.snapshot(instance)).filter(([, value]) => value !== undefined)
    )

    try {
      const query = insertIntoDynamicTable(raw, tableReference(entity), values)
      if (this.dialect === 'mysql') {
        const result = await query.executeTakeFirst()
        if (readRaw(instance, primaryKey) === undefined && result.insertId !== undefined) {
          writeRaw(instance, primaryKey, Number(result.insertId))
        }
      } else {
        const row = await query.returningAll().executeTakeFirst()
        if (row) {
          for (const [column, value] of Object.entries(toDynamicRow(row))) {
            writeRaw(instance, column, value)
          }
        }
      }
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }

    const id = readRaw(instance, primaryKey)
    if (id === undefined || id === null) {
      throw new IncompleteRowError(entity.tableName, primaryKey)
    }
    this.track(instance, identityKey(entity, id))
    this.insertedInTransaction.add(instance)
    bindInstance(instance, this.binding)
  }

  private async write(raw: Kysely<DB>, instance: AuthBase, changes: DynamicRow, current: DynamicRow): Promise<void> {
    const entity = this.registry.forInstance(instance)
    const primaryKey = primaryKeyOf(entity)
    const id = readRaw(instance, primaryKey)
    const predicate = conditionsExpression({ [primaryKey]: id })

    let updated: bigint
    try {
      let query = updateDynamicTable(raw, tableReference(entity), changes)
      if (predicate) {
        query = query.where(predicate)
      }
      const result = await query.executeTakeFirst()
      updated = result.numUpdatedRows
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }

    if (updated === 0n) {
      throw new NotFoundError(entity.name, { [primaryKey]: id })
    }
    this.snapshots.set(instance, current)
  }
}
