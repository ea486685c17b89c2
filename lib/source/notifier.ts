import { TILE_REQUESTED, TILE_RETRIEVED, type TileEventBus } from "../adapters/events";
import { tileKey, type TileIdentity } from "../coords";

export class TileLifecycleNotifier {
  constructor(private readonly bus: TileEventBus | null) {}

  requested(tile: TileIdentity) {
    this.bus?.publish(TILE_REQUESTED, tileKey(tile));
  }

  retrieved(tile: TileIdentity) {
    this.bus?.publish(TILE_RETRIEVED, tileKey(tile));
  }
}
