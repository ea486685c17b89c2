import fs from "node:fs/promises";
import path from "node:path";
import type { TileIdentity } from "../coords";
import { blake2sHex } from "../hashing";
import { decodeTileImage, encodeTileImage, type TileImage } from "../image/codec";
import type { TileCache } from "./cache";
import { hasErrorCode, withFileLock } from "./lock.file";

const CACHE_KEY_SEGMENT_RE = /^[a-z0-9][a-z0-9._-]{0,62}$/;

export function cacheKeySegment(cacheKey: string) {
  if (CACHE_KEY_SEGMENT_RE.test(cacheKey)) return cacheKey;
  return `k-${blake2sHex(cacheKey).slice(0, 24)}`;
}

export function cacheKeyDir(rootDir: string, cacheKey: string) {
  return path.join(rootDir, cacheKeySegment(cacheKey));
}

export function cachedTilePath(rootDir: string, cacheKey: string, tile: TileIdentity) {
  return path.join(cacheKeyDir(rootDir, cacheKey), `${tile.zoom}_${tile.x}_${tile.y}.png`);
}

/**
 * One PNG per tile on disk. Writes go through a temp file and a rename,
 * inside a per-tile file lock, so readers never see a partial image.
 */
export class FileTileCache implements TileCache {
  private readonly ensuredDirs = new Set<string>();

  constructor(private readonly rootDir: string) {}

  async cachedImage(tile: TileIdentity, cacheKey: string): Promise<TileImage | null> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(cachedTilePath(this.rootDir, cacheKey, tile));
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw error;
    }
    try {
      return await decodeTileImage(bytes);
    } catch (error) {
      console.warn(`[tile-cache] Discarding unreadable cache file for ${cacheKey} ${tile.zoom}/${tile.x}/${tile.y}:`, error);
      await fs.rm(cachedTilePath(this.rootDir, cacheKey, tile), { force: true });
      return null;
    }
  }

  async addImage(tile: TileIdentity, cacheKey: string, image: TileImage): Promise<void> {
    const dir = cacheKeyDir(this.rootDir, cacheKey);
    await this.ensureDir(dir);
    const target = cachedTilePath(this.rootDir, cacheKey, tile);
    const encoded = await encodeTileImage(image);
    const name = `${tile.zoom}_${tile.x}_${tile.y}`;

    await withFileLock(path.join(dir, "locks"), name, async () => {
      const temp = `${target}.${process.pid}.tmp`;
      await fs.writeFile(temp, encoded);
      await fs.rename(temp, target);
    });
  }

  async removeAllForCacheKey(cacheKey: string) {
    await fs.rm(cacheKeyDir(this.rootDir, cacheKey), { recursive: true, force: true });
    this.ensuredDirs.delete(cacheKeyDir(this.rootDir, cacheKey));
  }

  private async ensureDir(dir: string) {
    if (this.ensuredDirs.has(dir)) return;
    await fs.mkdir(dir, { recursive: true });
    this.ensuredDirs.add(dir);
  }
}
