import { AppConfig } from "../config";
import { JsonFileTargetStore } from "./jsonFileStore";
import { SqliteTargetStore } from "./sqliteStore";
import { TargetStore } from "./types";

export function createStore(config: AppConfig): TargetStore {
  switch (config.storeType) {
    case "json":
      return new JsonFileTargetStore(config.targetsPath);
    case "sqlite":
      return new SqliteTargetStore(config.storePath);
  }
}

export * from "./types";
export { JsonFileTargetStore } from "./jsonFileStore";
export { SqliteTargetStore } from "./sqliteStore";
export { InMemoryTargetStore } from "./memoryStore";
export { decodeTargets } from "./targetCodec";
