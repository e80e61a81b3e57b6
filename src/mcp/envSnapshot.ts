import type { JsonObject } from "../core/json.js";
import type { StorageMode } from "../db/connection.js";

export function envSnapshot(configHash: string, storageMode: StorageMode): JsonObject {
  return {
    node: process.version,
    mode: storageMode,
    config_hash: configHash
  };
}
