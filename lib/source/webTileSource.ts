import type { TileCache } from "../adapters/cache";
import type { TileEventBus } from "../adapters/events";
import type { TileTransport } from "../adapters/transport";
import { HttpTileTransport } from "../adapters/transport.http";
import {
  loadTileEnvConfig,
  perAttemptTimeoutMs,
  resolveRetryBudget,
  TileSourceConfigError,
  type RetryBudget,
} from "../config";
import { createMercatorTileProjection, tileLabel, ZMAX, ZMIN, type TileIdentity, type TileProjection } from "../coords";
import { decodeTileImage, type TileImage } from "../image/codec";
import { compositeTileImages } from "../image/compositor";
import { CacheGateway } from "./cacheGateway";
import { DefaultImageRegistry } from "./defaultImages";
import { fanOut } from "./fanOut";
import { fetchWithRetry } from "./fetchExecutor";
import { TileLifecycleNotifier } from "./notifier";
import { NO_SUCH_TILE, NO_TILE, type FetchBudget, type TileFetchResult } from "./types";

export type WebTileSourceOptions = {
  /** Distinguishes this source's entries in a cache shared with other sources. */
  cacheKey: string;
  retryCount?: number;
  requestTimeoutSeconds?: number;
  cacheable?: boolean;
  hidden?: boolean;
  minZoom?: number;
  maxZoom?: number;
  projection?: TileProjection;
  transport?: TileTransport;
  events?: TileEventBus;
  userAgent?: string;
};

/**
 * A network-backed tile source. Subclasses say where a tile lives by
 * overriding `urlForTile` (one layer) or `urlsForTile` (several layers,
 * bottom first); everything else, from cache to compositing, lives here.
 *
 * Instances hold no per-request state and may serve many tiles at once.
 */
export abstract class WebTileSource {
  readonly cacheKey: string;
  readonly minZoom: number;
  readonly maxZoom: number;
  protected readonly projection: TileProjection;
  protected readonly transport: TileTransport;
  private readonly notifier: TileLifecycleNotifier;
  private readonly defaults = new DefaultImageRegistry();
  private budget: RetryBudget;
  private cacheable: boolean;
  private hidden: boolean;

  constructor(options: WebTileSourceOptions) {
    const cacheKey = options.cacheKey.trim();
    if (!cacheKey) {
      throw new TileSourceConfigError("Tile source cacheKey is required");
    }
    const minZoom = options.minZoom ?? ZMIN;
    const maxZoom = options.maxZoom ?? ZMAX;
    if (!Number.isInteger(minZoom) || !Number.isInteger(maxZoom) || minZoom < ZMIN || maxZoom > ZMAX || minZoom > maxZoom) {
      throw new TileSourceConfigError(`Invalid zoom range ${minZoom}..${maxZoom}`);
    }

    const env = loadTileEnvConfig();
    this.cacheKey = cacheKey;
    this.minZoom = minZoom;
    this.maxZoom = maxZoom;
    this.budget = resolveRetryBudget(options, env);
    this.cacheable = options.cacheable ?? true;
    this.hidden = options.hidden ?? false;
    this.projection = options.projection ?? createMercatorTileProjection({ minZoom, maxZoom });
    this.transport = options.transport ?? new HttpTileTransport({ userAgent: options.userAgent ?? env.userAgent });
    this.notifier = new TileLifecycleNotifier(options.events ?? null);
  }

  get retryCount() {
    return this.budget.retryCount;
  }

  get requestTimeoutSeconds() {
    return this.budget.requestTimeoutSeconds;
  }

  get isCacheable() {
    return this.cacheable;
  }

  get isHidden() {
    return this.hidden;
  }

  setRetryBudget(options: { retryCount?: number; requestTimeoutSeconds?: number }) {
    this.budget = resolveRetryBudget({
      retryCount: options.retryCount ?? this.budget.retryCount,
      requestTimeoutSeconds: options.requestTimeoutSeconds ?? this.budget.requestTimeoutSeconds,
    });
  }

  setCacheable(cacheable: boolean) {
    this.cacheable = cacheable;
  }

  setHidden(hidden: boolean) {
    this.hidden = hidden;
  }

  addDefaultImage(zoom: number, image: TileImage) {
    this.defaults.register(zoom, image);
  }

  defaultImageForZoom(zoom: number): TileImage | null {
    return this.defaults.lookup(zoom);
  }

  protected urlForTile(tile: TileIdentity): string {
    throw new TileSourceConfigError(
      `${this.constructor.name} does not resolve tile ${tileLabel(tile)}: override urlForTile or urlsForTile`,
    );
  }

  urlsForTile(tile: TileIdentity): string[] {
    return [this.urlForTile(tile)];
  }

  /** Cache-only lookup: no network and no lifecycle events. */
  async cachedImageForTile(tile: TileIdentity, cache: TileCache | null = null): Promise<TileImage | null> {
    if (this.hidden) return null;
    const normalized = this.projection.normalizeTile(tile);
    if (!this.projection.tileExists(normalized)) return null;
    return this.gateway(cache).lookup(normalized);
  }

  async imageForTile(tile: TileIdentity, cache: TileCache | null = null): Promise<TileFetchResult> {
    if (this.hidden) return NO_TILE;

    const normalized = this.projection.normalizeTile(tile);
    if (!this.projection.tileExists(normalized)) return NO_SUCH_TILE;

    const gateway = this.gateway(cache);
    const cached = await gateway.lookup(normalized);
    if (cached) {
      return { kind: "image", image: cached, origin: "cache" };
    }

    this.notifier.requested(normalized);
    try {
      const result = await this.fetchFromNetwork(normalized);
      if (result.kind === "image") {
        await gateway.store(normalized, result.image);
      }
      return result;
    } finally {
      this.notifier.retrieved(normalized);
    }
  }

  private gateway(cache: TileCache | null) {
    return new CacheGateway(cache, this.cacheKey, { cacheable: this.cacheable, hidden: this.hidden });
  }

  private fetchBudget(): FetchBudget {
    return {
      maxAttempts: this.budget.retryCount,
      perAttemptTimeoutMs: perAttemptTimeoutMs(this.budget),
    };
  }

  private async fetchFromNetwork(tile: TileIdentity): Promise<TileFetchResult> {
    const urls = this.urlsForTile(tile);
    if (urls.length === 0) return NO_TILE;
    if (urls.length === 1) return this.fetchSingle(tile, urls[0]);
    return this.fetchLayers(tile, urls);
  }

  private async fetchSingle(tile: TileIdentity, url: string): Promise<TileFetchResult> {
    const outcome = await fetchWithRetry(this.transport, url, this.fetchBudget(), decodeTileImage);
    switch (outcome.kind) {
      case "success":
        return { kind: "image", image: outcome.value, origin: "network" };
      case "empty": {
        const fallback = this.defaults.lookup(tile.zoom);
        return fallback ? { kind: "image", image: fallback, origin: "default" } : NO_TILE;
      }
      case "not_found":
        return NO_TILE;
      case "transient":
        console.warn(`[tile-source] ${this.cacheKey} gave up on ${tileLabel(tile)}: ${outcome.error.message}`);
        return NO_TILE;
    }
  }

  // Empty layers are skipped here; default images only stand in for single-layer tiles.
  private async fetchLayers(tile: TileIdentity, urls: string[]): Promise<TileFetchResult> {
    const budget = this.fetchBudget();
    const layers = await fanOut(
      urls,
      async (url) => {
        const outcome = await fetchWithRetry(this.transport, url, budget, decodeTileImage);
        return outcome.kind === "success" ? outcome.value : null;
      },
      this.budget.requestTimeoutSeconds * 1000,
    );

    let image: TileImage | null;
    try {
      image = await compositeTileImages(layers);
    } catch (error) {
      console.error(`[tile-source] ${this.cacheKey} could not composite ${tileLabel(tile)}:`, error);
      return NO_TILE;
    }
    if (!image) {
      console.warn(`[tile-source] ${this.cacheKey} got no usable layers for ${tileLabel(tile)}`);
      return NO_TILE;
    }
    return { kind: "image", image, origin: "network" };
  }
}
