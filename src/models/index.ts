export * from "./schema";
export { isEntity, modelOf } from "./registry";
