import type { TileIdentity } from "../coords";
import type { TileImage } from "../image/codec";

export interface TileCache {
  cachedImage(tile: TileIdentity, cacheKey: string): Promise<TileImage | null>;
  addImage(tile: TileIdentity, cacheKey: string, image: TileImage): Promise<void>;
}

export function cacheEntryKey(tile: TileIdentity, cacheKey: string) {
  return `${cacheKey}/${tile.zoom}/${tile.x}/${tile.y}`;
}
