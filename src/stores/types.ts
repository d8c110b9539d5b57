// Persistence contract used by models to save built entities.

export type EntityKey = string | number;

export interface EntityStore<TModel> {
  /** Saves the entity under its primary key, replacing any previous value. */
  save(key: EntityKey, entity: TModel): void;
  get(key: EntityKey): TModel | undefined;
  all(): TModel[];
  count(): number;
  clear(): void;
}
