export { ModelBuilder } from "./modelBuilder";
export type { BuilderOptions, DefaultFields } from "./modelBuilder";
export { FieldNotFoundError, FixtureError, InvalidRelationError, UnimplementedDefaultsError, UnimplementedModelError } from "./errors";
export { deferred, isFieldValue, literal, resolveFieldInput, toFieldValue } from "./fieldValues";
export type { Deferred, FieldInput, FieldValue, Literal } from "./fieldValues";
export { DEFAULT_SETTER_PREFIX } from "./setters";
export type { BuilderFields, Fixture, SetterPrefix } from "./setters";
