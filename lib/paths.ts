import path from "node:path";
export const ROOT = process.cwd();

export const DEFAULT_TILE_CACHE_DIR = path.join(ROOT, ".tile-cache");
