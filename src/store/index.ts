import type { AppConfig } from "../config";
import type { PipelineStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(config: AppConfig): PipelineStore {
  return new SqliteStore(config.storePath);
}

export { SqliteStore };
export * from "./types";
