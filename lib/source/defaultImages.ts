import { TileSourceConfigError } from "../config";
import type { TileImage } from "../image/codec";

/** Per-zoom stand-ins for tiles the server reports as intentionally empty. */
export class DefaultImageRegistry {
  private readonly images = new Map<number, TileImage>();

  register(zoom: number, image: TileImage): void {
    if (!Number.isInteger(zoom) || zoom < 0) {
      throw new TileSourceConfigError(`Default image zoom must be a non-negative integer, got ${zoom}`);
    }
    this.images.set(zoom, image);
  }

  lookup(zoom: number): TileImage | null {
    return this.images.get(zoom) ?? null;
  }

  zooms(): number[] {
    return [...this.images.keys()].sort((a, b) => a - b);
  }
}
