import type { TileIdentity } from "../coords";
import { DEFAULT_CACHE_MAX_ENTRIES } from "../config";
import type { TileImage } from "../image/codec";
import { cacheEntryKey, type TileCache } from "./cache";

type MemoryEntry = {
  image: TileImage;
  lastAccess: number;
};

export type MemoryTileCacheStats = {
  size: number;
  maxEntries: number;
  hitRate: number;
};

/**
 * In-process LRU keyed by cache key + tile. Images are shared, not copied:
 * callers must treat returned pixels as read-only.
 */
export class MemoryTileCache implements TileCache {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;
  private clock = 0;

  constructor(maxEntries: number = DEFAULT_CACHE_MAX_ENTRIES) {
    this.maxEntries = Math.max(1, Math.floor(maxEntries));
  }

  async cachedImage(tile: TileIdentity, cacheKey: string): Promise<TileImage | null> {
    const entry = this.entries.get(cacheEntryKey(tile, cacheKey));
    if (!entry) {
      this.misses++;
      return null;
    }
    this.hits++;
    entry.lastAccess = this.tick();
    return entry.image;
  }

  async addImage(tile: TileIdentity, cacheKey: string, image: TileImage): Promise<void> {
    const key = cacheEntryKey(tile, cacheKey);
    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      this.evictLRU();
    }
    this.entries.set(key, { image, lastAccess: this.tick() });
  }

  has(tile: TileIdentity, cacheKey: string) {
    return this.entries.has(cacheEntryKey(tile, cacheKey));
  }

  /** Drops every entry stored under one source's cache key. */
  removeAllForCacheKey(cacheKey: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.split("/").slice(0, -3).join("/") === cacheKey) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): MemoryTileCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  // Logical clock, strictly increasing per access.
  private tick() {
    this.clock += 1;
    return this.clock;
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldest = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.lastAccess < oldest) {
        oldest = entry.lastAccess;
        oldestKey = key;
      }
    }
    if (oldestKey) {
      this.entries.delete(oldestKey);
    }
  }
}
