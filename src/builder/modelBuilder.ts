// ModelBuilder: chainable, copy-on-write construction of model entities for tests.
import { fake } from "../generators/registry";
import type { Generators } from "../generators/registry";
import { modelOf } from "../models/registry";
import type { AnyModelSchema, ModelSchema } from "../models/schema";
import { debug } from "../utils/logger";
import { FieldNotFoundError, InvalidRelationError, UnimplementedDefaultsError, UnimplementedModelError } from "./errors";
import { resolveFieldInput } from "./fieldValues";
import type { FieldInput } from "./fieldValues";
import { DEFAULT_SETTER_PREFIX } from "./setters";
import type { Fixture } from "./setters";

export interface BuilderOptions {
  /** Registry used for generated identities. Defaults to the process-wide `fake`. */
  generators?: Generators;
}

export type DefaultFields<TFields> = {
  [K in keyof TFields]?: FieldInput<TFields[K]>;
};

// Symbol-keyed so it can never collide with a prefixed setter name.
export const ASSIGN_FIELD = Symbol("assignField");

interface SetterHost {
  readonly setterPrefix: string;
  clone(): object;
  [ASSIGN_FIELD](field: string, value: unknown): object;
}

function hasOwn(source: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(source, key);
}

// True when `field` is a relation whose key column the caller set directly.
function isRelationKeySet(model: AnyModelSchema, data: Record<string, unknown>, field: string): boolean {
  return !model.hasColumn(field) && hasOwn(data, model.relationKey(field));
}

function relatedKey(model: AnyModelSchema, relation: string, value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  const related = modelOf(value);
  if (!related) {
    throw new InvalidRelationError(model.name, relation, value);
  }
  return related.pk(value);
}

/**
 * Wraps a builder so that prefixed property names resolve to setters.
 * The handler reads from the unwrapped target only, so it never re-enters itself.
 */
function exposeSetters<B extends SetterHost>(builder: B): B {
  return new Proxy(builder, {
    get(target, property, receiver) {
      if (typeof property !== "string" || property === "setterPrefix") {
        return Reflect.get(target, property, receiver);
      }
      const prefix = target.setterPrefix;
      if (!property.startsWith(prefix) || property.length === prefix.length) {
        return Reflect.get(target, property, receiver);
      }

      if (property in target) {
        const declared: unknown = Reflect.get(target, property, receiver);
        if (typeof declared !== "function") {
          return declared;
        }
        // Custom setter: run it against a copy and hand the copy back.
        return (...args: unknown[]) => {
          const next = target.clone();
          Reflect.apply(declared, next, args);
          return next;
        };
      }

      const field = property.slice(prefix.length);
      return (value: unknown) => target[ASSIGN_FIELD](field, value);
    },
  });
}

/**
 * Base class for fixture definitions.
 *
 * A subclass sets `model` and overrides `getDefaultFields()`. Callers chain
 * setters and finish with `build()`:
 *
 * ```ts
 * class AuthorBuilder extends ModelBuilder<SchemaModel<typeof Author>, SchemaFields<typeof Author>> {
 *   override readonly model = Author;
 *
 *   override getDefaultFields() {
 *     return {
 *       user: () => UserBuilder.create({ generators: this.generators }).build(),
 *       publishingName: "Jack Jackson",
 *       age: 23,
 *     };
 *   }
 * }
 *
 * const author = AuthorBuilder.create().with_age(40).build();
 * ```
 *
 * Every setter returns a new builder; the builder it was called on keeps its
 * pending values. Explicit values always win over defaults.
 */
export class ModelBuilder<TModel, TFields = TModel> {
  /** Prefix of the dynamic setters. Override with a literal, e.g. `override readonly setterPrefix = "set_"`. */
  readonly setterPrefix: string = DEFAULT_SETTER_PREFIX;
  readonly model?: ModelSchema<TModel, TFields>;
  /** Entity produced by the last build(). */
  instance?: TModel;
  /** Field values set on this builder, plus non-field context for the hooks. */
  protected data: Record<string, unknown> = {};
  protected readonly generators: Generators;

  constructor(options: BuilderOptions = {}) {
    this.generators = options.generators ?? fake;
    return exposeSetters(this);
  }

  /**
   * Creates a builder typed with its setters.
   */
  static create<B extends ModelBuilder<unknown, unknown>>(
    this: new (options?: BuilderOptions) => B,
    options?: BuilderOptions
  ): Fixture<B> {
    return new this(options).clone();
  }

  /**
   * Snapshot of the values set so far.
   */
  get pendingFieldValues(): Readonly<Record<string, unknown>> {
    return { ...this.data };
  }

  /**
   * Independent copy of this builder. Pending values are copied one level deep.
   */
  clone(): Fixture<this> {
    return this.copyWith({ ...this.data });
  }

  /**
   * Returns a new builder with `field` set.
   * Throws FieldNotFoundError when the model has no such field.
   */
  set<K extends keyof TFields & string>(field: K, value: FieldInput<TFields[K]>): Fixture<this> {
    return this[ASSIGN_FIELD](field, value);
  }

  [ASSIGN_FIELD](field: string, value: unknown): Fixture<this> {
    const model = this.getModel();
    if (!model.hasField(field)) {
      throw new FieldNotFoundError(model.name, field);
    }
    return this.copyWith({ ...this.data, [field]: value });
  }

  private copyWith(data: Record<string, unknown>): Fixture<this> {
    const copy: Fixture<this> = Object.create(Object.getPrototypeOf(this));
    Object.assign(copy, this, { data, instance: undefined });
    return exposeSetters(copy);
  }

  getModel(): ModelSchema<TModel, TFields> {
    if (!this.model) {
      throw new UnimplementedModelError(this.constructor.name);
    }
    return this.model;
  }

  /**
   * Default values for the model's fields. Called on every build, so producers
   * here run again each time.
   */
  getDefaultFields(): DefaultFields<TFields> {
    throw new UnimplementedDefaultsError(this.constructor.name);
  }

  /**
   * Extra non-field values for the hooks. Values already set on the builder win.
   */
  getBuilderContext(): Record<string, unknown> {
    return {};
  }

  /**
   * Identity for entities built without one.
   */
  protected nextIdentity(): unknown {
    return this.generators.id();
  }

  /**
   * Runs after field values are resolved and before the entity is constructed.
   * Changes to `fields` are applied to the entity.
   */
  protected pre(_fields: Record<string, unknown>): void {}

  /**
   * Runs after the entity is constructed and, when requested, saved.
   */
  protected post(_instance: TModel): void {}

  protected saveInstance(instance: TModel): void {
    this.getModel().save(instance);
  }

  /**
   * Builds the entity: defaults merged under explicit values, producers
   * resolved, relations replaced by their keys, identity assigned, hooks run.
   * Pass `persist = false` to skip saving.
   */
  build(persist: boolean = true): TModel {
    const model = this.getModel();
    const defaults = new Map<string, unknown>(Object.entries(this.getDefaultFields()));

    for (const [key, value] of Object.entries(this.getBuilderContext())) {
      if (!hasOwn(this.data, key)) {
        this.data[key] = value;
      }
    }

    const fields: Record<string, unknown> = {};
    for (const field of model.fieldNames) {
      if (hasOwn(this.data, field)) {
        fields[field] = resolveFieldInput(this.data[field]);
      } else if (defaults.has(field) && !isRelationKeySet(model, this.data, field)) {
        fields[field] = resolveFieldInput(defaults.get(field));
      }
    }

    for (const field of model.fieldNames) {
      if (model.hasColumn(field) || !hasOwn(fields, field)) {
        continue;
      }
      const value = fields[field];
      delete fields[field];
      if (isRelationKeySet(model, this.data, field)) {
        continue;
      }
      fields[model.relationKey(field)] = relatedKey(model, field, value);
    }

    if (fields[model.primaryKey] === undefined) {
      fields[model.primaryKey] = this.nextIdentity();
    }

    this.pre(fields);

    const columns: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(fields)) {
      if (model.hasColumn(key)) {
        columns[key] = value;
      }
    }

    const instance = model.create(columns);
    this.instance = instance;

    if (persist) {
      this.saveInstance(instance);
    }

    this.post(instance);

    debug("builder", `built ${model.name}`, { pk: model.pk(instance), persisted: persist });
    return instance;
  }

  /**
   * Builds `count` entities from the same pending values.
   */
  buildMany(count: number, persist: boolean = true): Array<TModel> {
    return Array.from({ length: count }, () => this.build(persist));
  }
}
