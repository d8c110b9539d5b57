export * from "./builder";
export * from "./generators";
export * from "./models";
export * from "./stores";
