export const ZMIN = 0;
export const ZMAX = 22;

export type TileIdentity = {
  readonly x: number;
  readonly y: number;
  readonly zoom: number;
};

export interface TileProjection {
  normalizeTile(tile: TileIdentity): TileIdentity;
  tileExists(tile: TileIdentity): boolean;
}

export function tile(x: number, y: number, zoom: number): TileIdentity {
  return { x, y, zoom };
}

/**
 * Packs a tile into one integer: zoom in the top byte, then 28 bits each
 * for x and y. Matches the layout tile caches and observers key on.
 */
export function tileKey(t: TileIdentity): bigint {
  return (BigInt(t.zoom) << 56n) | (BigInt(t.x) << 28n) | BigInt(t.y);
}

export function tileFromKey(key: bigint): TileIdentity {
  const mask = (1n << 28n) - 1n;
  return {
    zoom: Number(key >> 56n),
    x: Number((key >> 28n) & mask),
    y: Number(key & mask),
  };
}

export function tileLabel(t: TileIdentity) {
  return `${t.zoom}/${t.x}/${t.y}`;
}

export function tileGridSizeAtZoom(zoom: number) {
  return 2 ** zoom;
}

export function createMercatorTileProjection(options: { minZoom?: number; maxZoom?: number } = {}): TileProjection {
  const minZoom = options.minZoom ?? ZMIN;
  const maxZoom = options.maxZoom ?? ZMAX;

  return {
    normalizeTile(t) {
      const n = tileGridSizeAtZoom(t.zoom);
      const x = ((t.x % n) + n) % n;
      const y = Math.max(0, Math.min(n - 1, t.y));
      return { x, y, zoom: t.zoom };
    },
    tileExists(t) {
      if (!Number.isInteger(t.zoom) || !Number.isInteger(t.x) || !Number.isInteger(t.y)) return false;
      if (t.zoom < minZoom || t.zoom > maxZoom) return false;
      const n = tileGridSizeAtZoom(t.zoom);
      return t.x >= 0 && t.y >= 0 && t.x < n && t.y < n;
    },
  };
}
