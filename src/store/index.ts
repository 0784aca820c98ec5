import type { AppConfig } from "../config";
import { InMemoryStore } from "./memoryStore";
import { SqliteStore } from "./sqliteStore";
import type { PipelineStore } from "./types";

export function createStore(config: AppConfig, env: NodeJS.ProcessEnv = process.env): PipelineStore {
  if (env.STORE_TYPE === "memory") {
    return new InMemoryStore();
  }
  return new SqliteStore(config.storePath);
}

export { InMemoryStore } from "./memoryStore";
export { SqliteStore } from "./sqliteStore";
export { emptyStats } from "./stats";
export * from "./types";
