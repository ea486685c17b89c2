export * from "./coords";
export * from "./config";
export type { TileImage } from "./image/codec";
export { decodeTileImage, encodeTileImage, solidTileImage } from "./image/codec";
export { compositeTileImages } from "./image/compositor";
export * from "./adapters/cache";
export { MemoryTileCache, type MemoryTileCacheStats } from "./adapters/cache.memory";
export { FileTileCache } from "./adapters/cache.file";
export { createTileCache, type TileCacheKind } from "./adapters/cache.factory";
export * from "./adapters/events";
export * from "./adapters/transport";
export { HttpTileTransport, type HttpTileTransportOptions } from "./adapters/transport.http";
export * from "./source/types";
export { fetchWithRetry } from "./source/fetchExecutor";
export { fanOut, SlotCollector } from "./source/fanOut";
export { DefaultImageRegistry } from "./source/defaultImages";
export { CacheGateway, type CachePolicy } from "./source/cacheGateway";
export { WebTileSource, type WebTileSourceOptions } from "./source/webTileSource";
export {
  CompositeTileSource,
  TemplateTileSource,
  type CompositeTileSourceOptions,
  type TemplateTileSourceOptions,
} from "./source/templateSource";
