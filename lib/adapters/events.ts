import { EventEmitter } from "node:events";

export const TILE_REQUESTED = "tile:requested";
export const TILE_RETRIEVED = "tile:retrieved";

export type TileEventName = typeof TILE_REQUESTED | typeof TILE_RETRIEVED;
export type TileEventListener = (tileKey: bigint) => void;

export interface TileEventBus {
  publish(event: TileEventName, tileKey: bigint): void;
}

/**
 * Publishing only schedules delivery; listeners run on a later turn of the
 * event loop, one failure never reaching the publisher or other listeners.
 */
export class TileEventEmitter implements TileEventBus {
  private readonly emitter = new EventEmitter();

  publish(event: TileEventName, tileKey: bigint): void {
    setImmediate(() => {
      for (const listener of this.emitter.listeners(event)) {
        try {
          listener(tileKey);
        } catch (error) {
          console.error(`[tile-events] Listener for ${event} failed:`, error);
        }
      }
    });
  }

  on(event: TileEventName, listener: TileEventListener): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  listenerCount(event: TileEventName) {
    return this.emitter.listenerCount(event);
  }
}
