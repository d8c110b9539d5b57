// Types for the prefixed setters a builder exposes at run time.
import type { SchemaFields } from "../models/schema";
import type { FieldInput } from "./fieldValues";

export const DEFAULT_SETTER_PREFIX = "with_";

/**
 * The builder's setter prefix as a literal type. Subclasses that keep the
 * default (typed `string` on the base class) get "with_".
 */
export type SetterPrefix<B> = B extends { readonly setterPrefix: infer P extends string }
  ? string extends P
    ? typeof DEFAULT_SETTER_PREFIX
    : P
  : typeof DEFAULT_SETTER_PREFIX;

export type BuilderFields<B> = B extends { readonly model?: infer S } ? SchemaFields<S> : never;

type CustomSetterName<B, P extends string> = {
  [K in keyof B]: K extends `${P}${string}` ? (B[K] extends (...args: never[]) => unknown ? K : never) : never;
}[keyof B];

type FieldSetterName<B, P extends string> = `${P}${keyof BuilderFields<B> & string}`;

type SetterArgs<B, P extends string, K> = K extends keyof B
  ? B[K] extends (...args: infer A) => unknown
    ? A
    : never
  : K extends `${P}${infer F}`
    ? F extends keyof BuilderFields<B>
      ? [value: FieldInput<BuilderFields<B>[F]>]
      : never
    : never;

/**
 * A builder together with its setters: `with_<field>(value)` for every model
 * field, and every method the builder declares under the prefix. Each setter
 * returns a new builder.
 */
export type Fixture<B> = {
  [K in CustomSetterName<B, SetterPrefix<B>> | FieldSetterName<B, SetterPrefix<B>>]: (
    ...args: SetterArgs<B, SetterPrefix<B>, K>
  ) => Fixture<B>;
} & B;
