import { loadTileEnvConfig, type TileEnvConfig } from "../config";
import type { TileCache } from "./cache";
import { FileTileCache } from "./cache.file";
import { MemoryTileCache } from "./cache.memory";

export type TileCacheKind = "memory" | "file";

export function createTileCache(kind: TileCacheKind, config: TileEnvConfig = loadTileEnvConfig()): TileCache {
  if (kind === "file") {
    return new FileTileCache(config.cacheDir);
  }
  return new MemoryTileCache(config.cacheMaxEntries);
}
