// Errors raised by builders. All of them point at a mistake in a fixture definition or a test.

export class FixtureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FixtureError";
  }
}

export class UnimplementedDefaultsError extends FixtureError {
  public readonly builder: string;

  constructor(builder: string) {
    super(`${builder} must override getDefaultFields() to supply default values for its model.`);
    this.name = "UnimplementedDefaultsError";
    this.builder = builder;
  }
}

export class UnimplementedModelError extends FixtureError {
  public readonly builder: string;

  constructor(builder: string) {
    super(`${builder} has no model. Set the model property or override getModel().`);
    this.name = "UnimplementedModelError";
    this.builder = builder;
  }
}

export class FieldNotFoundError extends FixtureError {
  public readonly model: string;
  public readonly field: string;

  constructor(model: string, field: string) {
    super(`Model "${model}" has no field "${field}".`);
    this.name = "FieldNotFoundError";
    this.model = model;
    this.field = field;
  }
}

export class InvalidRelationError extends FixtureError {
  public readonly model: string;
  public readonly relation: string;

  constructor(model: string, relation: string, value: unknown) {
    super(`Relation "${relation}" on model "${model}" needs a built entity. Received: ${String(value)}`);
    this.name = "InvalidRelationError";
    this.model = model;
    this.relation = relation;
  }
}
