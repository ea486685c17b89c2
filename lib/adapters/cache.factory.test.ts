import assert from "node:assert/strict";
import test from "node:test";
import { loadTileEnvConfig } from "../config";
import { FileTileCache } from "./cache.file";
import { createTileCache } from "./cache.factory";
import { MemoryTileCache } from "./cache.memory";

test("cache kind and sizing come from configuration", () => {
  const config = loadTileEnvConfig({ TILE_CACHE_DIR: "/tmp/tile-cache-test", TILE_CACHE_MAX_ENTRIES: "8" });

  const memory = createTileCache("memory", config);
  assert.ok(memory instanceof MemoryTileCache);
  assert.equal(memory.getStats().maxEntries, 8);

  assert.ok(createTileCache("file", config) instanceof FileTileCache);
});
