export { JsonFileStore } from "./jsonFileStore";
export { MemoryStore } from "./memoryStore";
export type { EntityKey, EntityStore } from "./types";
