import { AppConfig } from "../config";
import { HarvestStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(config: AppConfig): HarvestStore {
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
