import type { TileCache } from "../adapters/cache";
import { cacheEntryKey } from "../adapters/cache";
import { withKeyLock } from "../adapters/lock";
import { tileLabel, type TileIdentity } from "../coords";
import type { TileImage } from "../image/codec";

export type CachePolicy = {
  cacheable: boolean;
  hidden: boolean;
};

/**
 * Decides when the shared tile cache is read or written for one source.
 * Cache faults are logged and treated as misses; they never fail a fetch.
 */
export class CacheGateway {
  constructor(
    private readonly cache: TileCache | null,
    private readonly cacheKey: string,
    private readonly policy: CachePolicy,
  ) {}

  get enabled() {
    return this.cache !== null && this.policy.cacheable && !this.policy.hidden;
  }

  async lookup(tile: TileIdentity): Promise<TileImage | null> {
    if (!this.cache || !this.enabled) return null;
    try {
      return await this.cache.cachedImage(tile, this.cacheKey);
    } catch (error) {
      console.error(`[tile-cache] Lookup failed for ${this.cacheKey} ${tileLabel(tile)}:`, error);
      return null;
    }
  }

  async store(tile: TileIdentity, image: TileImage | null): Promise<boolean> {
    const cache = this.cache;
    if (!cache || !image || !this.enabled) return false;
    try {
      await withKeyLock(cacheEntryKey(tile, this.cacheKey), () => cache.addImage(tile, this.cacheKey, image));
      return true;
    } catch (error) {
      console.error(`[tile-cache] Store failed for ${this.cacheKey} ${tileLabel(tile)}:`, error);
      return false;
    }
  }
}
