// Models and builders shared by the builder tests.
import { z } from "zod";
import { defineModel } from "../../models/schema";
import type { SchemaFields, SchemaModel } from "../../models/schema";
import { ModelBuilder } from "../modelBuilder";

export const UserModel = defineModel({
  name: "User",
  shape: {
    id: z.number().int(),
    email: z.string(),
  },
});

export const AuthorModel = defineModel({
  name: "Author",
  shape: {
    id: z.number().int(),
    userId: z.number().int(),
    publishingName: z.string().max(25).nullable(),
    age: z.number().int(),
  },
  relations: {
    user: { model: UserModel, key: "userId" },
  },
});

export type User = SchemaModel<typeof UserModel>;
export type Author = SchemaModel<typeof AuthorModel>;

export class UserBuilder extends ModelBuilder<User, SchemaFields<typeof UserModel>> {
  override readonly model = UserModel;

  override getDefaultFields() {
    return {
      email: "fakeFakeson@gmail.com",
    };
  }
}

export class AuthorBuilder extends ModelBuilder<Author, SchemaFields<typeof AuthorModel>> {
  override readonly model = AuthorModel;

  override getDefaultFields() {
    return {
      user: () => UserBuilder.create({ generators: this.generators }).build(),
      publishingName: "Jack Jackson",
      age: 23,
    };
  }
}

/**
 * Calls a setter by name, for names the builder's type does not declare.
 */
export function callSetter(builder: object, name: string, value: unknown): unknown {
  const setter: unknown = Reflect.get(builder, name);
  if (typeof setter !== "function") {
    throw new Error(`${name} is not a setter`);
  }
  return Reflect.apply(setter, builder, [value]);
}

export function clearStores(): void {
  UserModel.store.clear();
  AuthorModel.store.clear();
}
