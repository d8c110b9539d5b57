// Tracks which objects were created by a model, so builders can recognise relation values.
import type { AnyModelSchema } from "./schema";

const entityModels: WeakMap<object, AnyModelSchema> = new WeakMap();

export function registerEntity(entity: unknown, model: AnyModelSchema): void {
  if (typeof entity === "object" && entity !== null) {
    entityModels.set(entity, model);
  }
}

/**
 * Model that created the value, or undefined when the value is not an entity.
 */
export function modelOf(value: unknown): AnyModelSchema | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  return entityModels.get(value);
}

export function isEntity(value: unknown): value is object {
  return modelOf(value) !== undefined;
}
