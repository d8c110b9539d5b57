import type { EntityKey, EntityStore } from "./types";

/**
 * Keeps entities in a Map for the lifetime of the process.
 */
export class MemoryStore<TModel> implements EntityStore<TModel> {
  private readonly entities: Map<EntityKey, TModel> = new Map();

  save(key: EntityKey, entity: TModel): void {
    this.entities.set(key, entity);
  }

  get(key: EntityKey): TModel | undefined {
    return this.entities.get(key);
  }

  all(): TModel[] {
    return Array.from(this.entities.values());
  }

  count(): number {
    return this.entities.size;
  }

  clear(): void {
    this.entities.clear();
  }
}
