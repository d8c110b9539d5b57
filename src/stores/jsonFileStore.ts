// File-backed entity store: one JSON document per store, keyed by primary key.
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import path from "path";
import { getStoreDir } from "../utils/config";
import type { EntityKey, EntityStore } from "./types";

/**
 * Persists entities as JSON. Values round-trip through JSON.stringify, so
 * Dates come back as ISO strings.
 */
export class JsonFileStore<TModel> implements EntityStore<TModel> {
  constructor(readonly filePath: string) {}

  /**
   * Store for a model under FIXTURES_STORE_DIR, e.g. ".fixtures/Author.json".
   */
  static forModel<TModel>(modelName: string): JsonFileStore<TModel> {
    return new JsonFileStore<TModel>(path.join(getStoreDir(), `${modelName}.json`));
  }

  private read(): Record<string, TModel> {
    if (!existsSync(this.filePath)) {
      return {};
    }
    const data = readFileSync(this.filePath, "utf-8");
    if (!data.trim()) {
      return {};
    }
    try {
      return JSON.parse(data);
    } catch (error) {
      throw new Error(
        `Store file ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  // Readers never see a half-written document: write beside it, then rename over it.
  private write(entities: Record<string, TModel>): void {
    mkdirSync(path.dirname(this.filePath), { recursive: true });
    const pendingPath = `${this.filePath}.tmp`;
    try {
      writeFileSync(pendingPath, JSON.stringify(entities, null, 2), "utf-8");
      renameSync(pendingPath, this.filePath);
    } catch (error) {
      rmSync(pendingPath, { force: true });
      throw error;
    }
  }

  save(key: EntityKey, entity: TModel): void {
    const entities = this.read();
    entities[String(key)] = entity;
    this.write(entities);
  }

  get(key: EntityKey): TModel | undefined {
    return this.read()[String(key)];
  }

  all(): TModel[] {
    return Object.values(this.read());
  }

  count(): number {
    return Object.keys(this.read()).length;
  }

  clear(): void {
    this.write({});
  }
}
