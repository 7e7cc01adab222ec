/**
 * Entity registry
 *
 * Maps table names to the entity classes registered with a session, so the
 * resolver can go from a table in a FROM clause to the class whose
 * `addAuthFilters` applies.
 */

import { UnregisteredEntityError, UnsupportedConfigurationError } from '../errors.js'
import type { AuthBase, EntityType } from './auth-base.js'

function tableKey(table: string, schema?: string): string {
  return schema ? `${schema}.${table}` : table
}

export class EntityRegistry {
  private readonly byTable = new Map<string, EntityType>()
  private readonly entities: EntityType[] = []

  constructor(entities: Iterable<EntityType> = []) {
    for (const entity of entities) {
      this.register(entity)
    }
  }

  /**
   * Register an entity class. Two classes may not claim the same table.
   */
  register(entity: EntityType): void {
    const key = tableKey(entity.tableName, entity.schema)
    const existing = this.byTable.get(key)
    if (existing === entity) {
      return
    }
    if (existing) {
      throw new UnsupportedConfigurationError(
        'entities',
        `${entity.name} and ${existing.name} are both mapped to table '${key}'`
      )
    }
    this.byTable.set(key, entity)
    this.entities.push(entity)
  }

  /**
   * Entity for a table as it appears in a query. A schema-qualified lookup
   * falls back to an entity registered without a schema.
   */
  forTable(table: string, schema?: string): EntityType | undefined {
    if (schema) {
      return this.byTable.get(tableKey(table, schema)) ?? this.byTable.get(table)
    }
    return this.byTable.get(table) ?? this.entities.find(entity => entity.tableName === table)
  }

  /**
   * Entity class of an instance, most derived registration first.
   */
  forInstance(instance: AuthBase): EntityType {
    const exact = this.entities.find(entity => Object.getPrototypeOf(instance) === entity.prototype)
    const match = exact ?? this.entities.find(entity => instance instanceof entity)
    if (!match) {
      throw new UnregisteredEntityError(instance.constructor.name)
    }
    return match
  }

  has(entity: EntityType): boolean {
    return this.entities.includes(entity)
  }

  all(): readonly EntityType[] {
    return this.entities
  }
}
