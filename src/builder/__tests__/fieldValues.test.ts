// Unit tests for literal and deferred field values
import { describe, test, expect } from "@jest/globals";
import { deferred, isFieldValue, literal, resolveFieldInput, toFieldValue } from "../fieldValues";

describe("field values", () => {
  test("plain values resolve to themselves", () => {
    const tags = ["a", "b"];

    expect(resolveFieldInput(5)).toBe(5);
    expect(resolveFieldInput(null)).toBeNull();
    expect(resolveFieldInput(tags)).toBe(tags);
  });

  test("zero-argument functions are producers", () => {
    let calls = 0;
    const produce = () => ++calls;

    expect(resolveFieldInput(produce)).toBe(1);
    expect(resolveFieldInput(produce)).toBe(2);
  });

  test("functions that take arguments are stored as they are", () => {
    const format = (value: string) => value.toUpperCase();

    expect(resolveFieldInput(format)).toBe(format);
  });

  test("literal() keeps a producer from being called", () => {
    const produce = () => "called";

    expect(resolveFieldInput(literal(produce))).toBe(produce);
  });

  test("deferred() runs its producer on every resolution", () => {
    let calls = 0;
    const value = deferred(() => ++calls);

    resolveFieldInput(value);

    expect(resolveFieldInput(value)).toBe(2);
  });

  test("toFieldValue() tags inputs by kind", () => {
    expect(toFieldValue(3)).toMatchObject({ kind: "literal", value: 3 });
    expect(toFieldValue(() => 3)).toMatchObject({ kind: "deferred" });

    const tagged = literal("x");
    expect(toFieldValue(tagged)).toBe(tagged);
  });

  test("isFieldValue() recognises only tagged values", () => {
    expect(isFieldValue(literal(1))).toBe(true);
    expect(isFieldValue(deferred(() => 1))).toBe(true);
    expect(isFieldValue({ kind: "literal", value: 1 })).toBe(false);
    expect(isFieldValue(undefined)).toBe(false);
  });
});
