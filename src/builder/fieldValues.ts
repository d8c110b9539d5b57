// Field values: literals, or producers evaluated once per build.

export const FIELD_VALUE = Symbol("fieldValue");

export interface Literal<T> {
  readonly [FIELD_VALUE]: true;
  readonly kind: "literal";
  readonly value: T;
}

export interface Deferred<T> {
  readonly [FIELD_VALUE]: true;
  readonly kind: "deferred";
  readonly produce: () => T;
}

export type FieldValue<T> = Literal<T> | Deferred<T>;

/**
 * What setters and defaults accept. A bare zero-argument function is treated
 * as a producer; wrap it in literal() to store the function itself.
 */
export type FieldInput<T> = T | (() => T) | FieldValue<T>;

export function literal<T>(value: T): Literal<T> {
  return { [FIELD_VALUE]: true, kind: "literal", value };
}

export function deferred<T>(produce: () => T): Deferred<T> {
  return { [FIELD_VALUE]: true, kind: "deferred", produce };
}

export function isFieldValue(input: unknown): input is FieldValue<unknown> {
  return typeof input === "object" && input !== null && FIELD_VALUE in input;
}

function isProducer(input: unknown): input is () => unknown {
  return typeof input === "function" && input.length === 0;
}

export function toFieldValue(input: unknown): FieldValue<unknown> {
  if (isFieldValue(input)) {
    return input;
  }
  if (isProducer(input)) {
    return deferred(input);
  }
  return literal(input);
}

/**
 * Normalizes the input and evaluates it. Producers run on every call.
 */
export function resolveFieldInput(input: unknown): unknown {
  const value = toFieldValue(input);
  return value.kind === "literal" ? value.value : value.produce();
}
