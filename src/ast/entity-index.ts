import type { Entity } from './nodes'

function isDefinition(entity: Entity): boolean {
  return entity.type !== 'FunctionParameter' && entity.bodyKind !== 'Declaration'
}

/**
 * Finished entities by id. A redeclaration keeps the first entity unless
 * the new one is a definition (or defaulted/deleted) and the stored one is
 * not.
 */
export class EntityIndex {
  private entities: Map<string, Entity>

  constructor() {
    this.entities = new Map()
  }

  register(entity: Entity): void {
    const existing = this.entities.get(entity.id)
    if (existing === undefined || (isDefinition(entity) && !isDefinition(existing))) {
      this.entities.set(entity.id, entity)
    }
  }

  lookup(id: string): Entity | null {
    return this.entities.get(id) ?? null
  }

  get size(): number {
    return this.entities.size
  }
}
