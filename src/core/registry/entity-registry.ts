/**
 * Entity registry - read-only lookup of every loaded entity.
 *
 * Shared by all action compilations; never mutated while compiling.
 */
import type { Entity, FieldDefinition } from '../ast/types.js';
import { logger } from '../../utils/logger.js';

export class EntityRegistry {
  private readonly entities = new Map<string, Entity>();

  constructor(entities: readonly Entity[] = []) {
    for (const entity of entities) {
      this.register(entity);
    }
  }

  /**
   * Add an entity. A later definition with the same name replaces the earlier one.
   */
  register(entity: Entity): void {
    if (this.entities.has(entity.name)) {
      logger.warn(`Entity ${entity.name} is defined more than once; using the last definition`);
    }
    this.entities.set(entity.name, entity);
  }

  get(name: string): Entity | undefined {
    return this.entities.get(name);
  }

  has(name: string): boolean {
    return this.entities.has(name);
  }

  names(): string[] {
    return [...this.entities.keys()];
  }

  all(): Entity[] {
    return [...this.entities.values()];
  }

  /**
   * Schema an entity lives in, or the fallback for unknown entities.
   */
  schemaOf(name: string, fallback: string): string {
    return this.entities.get(name)?.schema ?? fallback;
  }

  field(entityName: string, fieldName: string): FieldDefinition | undefined {
    return this.entities.get(entityName)?.fields[fieldName];
  }
}
