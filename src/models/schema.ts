// Entity schemas: the field list, constructor and save operation a builder works against.
import { z } from "zod";
import { MemoryStore } from "../stores/memoryStore";
import type { EntityKey, EntityStore } from "../stores/types";
import { registerEntity } from "./registry";

/**
 * What a builder needs from a model: its field names, a way to construct an
 * entity from a field map, a save operation and a primary-key accessor.
 */
export interface ModelSchema<TModel, TFields = TModel> {
  readonly name: string;
  readonly primaryKey: string;
  /** Entity columns followed by relation names. */
  readonly fieldNames: readonly string[];
  /** Type-level only: the values a builder may set. Never present at run time. */
  readonly $fields?: TFields;
  /** True for columns and relation names. */
  hasField(field: string): boolean;
  /** True for columns stored on the entity. */
  hasColumn(field: string): boolean;
  /** Column that receives a related entity's primary key. */
  relationKey(field: string): string;
  create(values: Record<string, unknown>): TModel;
  save(entity: TModel): TModel;
  pk(entity: TModel): unknown;
}

export type AnyModelSchema = ModelSchema<unknown, unknown>;

export type SchemaModel<S> = S extends ModelSchema<infer TModel, unknown> ? TModel : never;

export type SchemaFields<S> = S extends ModelSchema<unknown, infer TFields> ? TFields : never;

export interface RelationDefinition<TTarget extends AnyModelSchema = AnyModelSchema> {
  model: TTarget;
  /** Defaults to `<relation>Id`. */
  key?: string;
}

type RelationFields<TRelations> = {
  [K in keyof TRelations]: TRelations[K] extends RelationDefinition<infer TTarget> ? SchemaModel<TTarget> : never;
};

export type InferModel<TShape extends z.ZodRawShape> = z.infer<z.ZodObject<TShape>>;

export interface ModelDefinition<TShape extends z.ZodRawShape, TRelations> {
  name: string;
  shape: TShape;
  /** Defaults to "id". */
  primaryKey?: keyof TShape & string;
  relations?: TRelations;
  /** Defaults to a MemoryStore. */
  store?: EntityStore<InferModel<TShape>>;
}

export interface DefinedModel<TModel, TFields> extends ModelSchema<TModel, TFields> {
  readonly store: EntityStore<TModel>;
}

function readKey(entity: unknown, key: string): unknown {
  if (typeof entity !== "object" || entity === null) {
    return undefined;
  }
  return Reflect.get(entity, key);
}

function toEntityKey(modelName: string, value: unknown): EntityKey {
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  throw new Error(`Cannot save ${modelName}: primary key must be a string or number. Received: ${String(value)}`);
}

/**
 * Defines a model from a zod object shape. Entities are plain objects parsed by
 * the shape: unknown keys are stripped and invalid values throw a ZodError.
 *
 * @example
 * ```ts
 * const Author = defineModel({
 *   name: "Author",
 *   shape: { id: z.number().int(), userId: z.number().int(), age: z.number().int() },
 *   relations: { user: { model: User, key: "userId" } },
 * });
 * ```
 */
export function defineModel<
  TShape extends z.ZodRawShape,
  TRelations extends Record<string, RelationDefinition> = Record<never, RelationDefinition>
>(
  definition: ModelDefinition<TShape, TRelations>
): DefinedModel<InferModel<TShape>, InferModel<TShape> & RelationFields<TRelations>> {
  const { name, shape } = definition;
  const objectSchema = z.object(shape);
  const columns = Object.keys(shape);
  const relationNames = Object.keys(definition.relations ?? {});
  const primaryKey = definition.primaryKey ?? "id";

  if (!columns.includes(primaryKey)) {
    throw new Error(`Model "${name}" has no primary key column "${primaryKey}".`);
  }
  const overlapping = relationNames.filter((relation) => columns.includes(relation));
  if (overlapping.length > 0) {
    throw new Error(`Model "${name}" declares ${overlapping.join(", ")} as both a column and a relation.`);
  }

  const store = definition.store ?? new MemoryStore<InferModel<TShape>>();

  const model: DefinedModel<InferModel<TShape>, InferModel<TShape> & RelationFields<TRelations>> = {
    name,
    primaryKey,
    fieldNames: [...columns, ...relationNames],
    store,
    hasField: (field) => columns.includes(field) || relationNames.includes(field),
    hasColumn: (field) => columns.includes(field),
    relationKey: (field) => definition.relations?.[field]?.key ?? `${field}Id`,
    create: (values) => {
      const entity = objectSchema.parse(values);
      registerEntity(entity, model);
      return entity;
    },
    save: (entity) => {
      store.save(toEntityKey(name, readKey(entity, primaryKey)), entity);
      return entity;
    },
    pk: (entity) => readKey(entity, primaryKey),
  };
  return model;
}
