import assert from "node:assert/strict";
import test from "node:test";
import type { TileCache } from "../adapters/cache";
import { MemoryTileCache } from "../adapters/cache.memory";
import { TILE_REQUESTED, TILE_RETRIEVED, TileEventEmitter } from "../adapters/events";
import { TileSourceConfigError } from "../config";
import { tile, tileKey, type TileIdentity } from "../coords";
import { decodeTileImage, encodeTileImage, solidTileImage } from "../image/codec";
import { compositeTileImages } from "../image/compositor";
import {
  BLUE,
  CLEAR,
  delay,
  flushImmediates,
  GREEN,
  pixelAt,
  pngBytes,
  recordEvents,
  RED,
  respond,
  ScriptedTransport,
  SpyCache,
} from "../testing/fakes";
import { CompositeTileSource, TemplateTileSource } from "./templateSource";
import { WebTileSource, type WebTileSourceOptions } from "./webTileSource";

const TEMPLATE = "https://tiles.example.test/{z}/{x}/{y}.png";
const BASE = "https://base.example.test/{z}/{x}/{y}.png";
const ROADS = "https://roads.example.test/{z}/{x}/{y}.png";
const LABELS = "https://labels.example.test/{z}/{x}/{y}.png";

function url(template: string, t: TileIdentity) {
  return template.replace("{z}", String(t.zoom)).replace("{x}", String(t.x)).replace("{y}", String(t.y));
}

function setup(options: Partial<WebTileSourceOptions> = {}) {
  const transport = new ScriptedTransport();
  const events = new TileEventEmitter();
  const seen = recordEvents(events);
  const source = new TemplateTileSource({
    urlTemplate: TEMPLATE,
    cacheKey: "streets",
    transport,
    events,
    ...options,
  });
  return { source, transport, events, seen };
}

async function twoPixelPng(left: readonly number[], right: readonly number[]) {
  return encodeTileImage({ width: 2, height: 1, data: Buffer.from([...left, ...right]) });
}

test("tile (2,3,5) survives two timeouts and is cached before it is returned", async () => {
  const { source, transport, seen } = setup({ retryCount: 3, requestTimeoutSeconds: 60 });
  const cache = new MemoryTileCache();
  const target = tile(2, 3, 5);
  transport.script(url(TEMPLATE, target), respond.timeout(), respond.timeout(), respond.ok(await pngBytes(2, 2, RED)));

  const result = await source.imageForTile(target, cache);

  assert.equal(result.kind, "image");
  assert.ok(result.kind === "image");
  assert.equal(result.origin, "network");
  assert.deepEqual(pixelAt(result.image, 1, 1), [...RED]);
  assert.equal(await cache.cachedImage(target, "streets"), result.image);
  assert.deepEqual(
    transport.calls.map((call) => call.timeoutMs),
    [20_000, 20_000, 20_000],
  );

  await flushImmediates();
  assert.deepEqual(seen, [
    { name: TILE_REQUESTED, key: tileKey(target) },
    { name: TILE_RETRIEVED, key: tileKey(target) },
  ]);
});

test("a cache hit makes no network call and fires no events", async () => {
  const { source, transport, seen } = setup();
  const cache = new MemoryTileCache();
  const stored = solidTileImage(2, 2, BLUE);
  await cache.addImage(tile(1, 1, 2), "streets", stored);

  const result = await source.imageForTile(tile(1, 1, 2), cache);

  assert.deepEqual(result, { kind: "image", image: stored, origin: "cache" });
  assert.equal(transport.calls.length, 0);
  await flushImmediates();
  assert.deepEqual(seen, []);
});

test("fetching twice with a warm cache hits the network once", async () => {
  const { source, transport } = setup();
  const cache = new MemoryTileCache();
  const target = tile(0, 1, 1);
  transport.script(url(TEMPLATE, target), respond.ok(await pngBytes(2, 2, GREEN)));

  const first = await source.imageForTile(target, cache);
  const second = await source.imageForTile(target, cache);

  assert.ok(first.kind === "image" && second.kind === "image");
  assert.equal(first.origin, "network");
  assert.equal(second.origin, "cache");
  assert.deepEqual(second.image.data, first.image.data);
  assert.equal(transport.calls.length, 1);
});

test("retryCount = 1 makes one attempt with the whole timeout", async () => {
  const { source, transport } = setup({ retryCount: 1, requestTimeoutSeconds: 60 });
  const target = tile(0, 0, 1);
  transport.script(url(TEMPLATE, target), respond.timeout(), respond.ok(await pngBytes(1, 1, RED)));

  const result = await source.imageForTile(target);

  assert.deepEqual(result, { kind: "none" });
  assert.deepEqual(transport.calls, [{ location: url(TEMPLATE, target), timeoutMs: 60_000 }]);
});

test("no content on a single layer is replaced by the zoom's default image and cached", async () => {
  const { source, transport } = setup();
  const cache = new SpyCache(new MemoryTileCache());
  const ocean = solidTileImage(2, 2, BLUE);
  source.addDefaultImage(4, ocean);
  const target = tile(3, 3, 4);
  transport.script(url(TEMPLATE, target), respond.noContent());

  const result = await source.imageForTile(target, cache);

  assert.deepEqual(result, { kind: "image", image: ocean, origin: "default" });
  assert.equal(transport.calls.length, 1);
  assert.equal(cache.stores.length, 1);
  assert.equal(cache.stores[0].image, ocean);
});

test("no content without a default image yields no tile", async () => {
  const { source, transport } = setup();
  const cache = new SpyCache();
  transport.script(url(TEMPLATE, tile(0, 0, 2)), respond.noContent());

  assert.deepEqual(await source.imageForTile(tile(0, 0, 2), cache), { kind: "none" });
  assert.equal(cache.stores.length, 0);
});

test("404 ends the fetch after one attempt and nothing is cached", async () => {
  const { source, transport, seen } = setup({ retryCount: 5 });
  const cache = new SpyCache();
  const target = tile(1, 0, 1);
  transport.script(url(TEMPLATE, target), respond.notFound());

  const result = await source.imageForTile(target, cache);

  assert.deepEqual(result, { kind: "none" });
  assert.equal(transport.calls.length, 1);
  assert.equal(cache.stores.length, 0);
  await flushImmediates();
  assert.deepEqual(
    seen.map((event) => event.name),
    [TILE_REQUESTED, TILE_RETRIEVED],
  );
});

test("a failed middle layer composites like the remaining layers in order", async () => {
  const transport = new ScriptedTransport();
  const source = new CompositeTileSource({ urlTemplates: [BASE, ROADS, LABELS], transport });
  const target = tile(1, 2, 3);
  const basePng = await pngBytes(2, 1, RED);
  const labelsPng = await twoPixelPng(CLEAR, GREEN);
  transport
    .script(url(BASE, target), respond.ok(basePng))
    .script(url(ROADS, target), respond.serverError())
    .script(url(LABELS, target), respond.ok(labelsPng));

  const result = await source.imageForTile(target);
  const expected = await compositeTileImages([await decodeTileImage(basePng), await decodeTileImage(labelsPng)]);

  assert.ok(result.kind === "image" && expected);
  assert.deepEqual(result.image.data, expected.data);
  assert.deepEqual(pixelAt(result.image, 0, 0), [...RED]);
  assert.deepEqual(pixelAt(result.image, 1, 0), [...GREEN]);
  assert.equal(transport.callsFor(url(ROADS, target)).length, source.retryCount);
});

test("layer order follows the resolver, not completion order", async () => {
  const transport = new ScriptedTransport();
  const source = new CompositeTileSource({ urlTemplates: [BASE, LABELS], transport });
  const target = tile(0, 0, 1);
  const slowBase = await pngBytes(1, 1, RED);
  transport
    .script(url(BASE, target), async () => {
      await delay(30);
      return respond.ok(slowBase);
    })
    .script(url(LABELS, target), respond.ok(await pngBytes(1, 1, BLUE)));

  const result = await source.imageForTile(target);

  assert.ok(result.kind === "image");
  assert.deepEqual(pixelAt(result.image, 0, 0), [...BLUE]);
});

test("tile (0,0,0) with two no-content layers yields no tile even with a default image", async () => {
  const transport = new ScriptedTransport();
  const cache = new SpyCache();
  const source = new CompositeTileSource({ urlTemplates: [BASE, LABELS], transport });
  source.addDefaultImage(0, solidTileImage(1, 1, BLUE));
  const target = tile(0, 0, 0);
  transport.script(url(BASE, target), respond.noContent()).script(url(LABELS, target), respond.noContent());

  assert.deepEqual(await source.imageForTile(target, cache), { kind: "none" });
  assert.equal(cache.stores.length, 0);
});

test("layers slower than the tile deadline are left out", async () => {
  const transport = new ScriptedTransport();
  const source = new CompositeTileSource({
    urlTemplates: [BASE, LABELS],
    transport,
    retryCount: 1,
    requestTimeoutSeconds: 0.05,
  });
  const target = tile(1, 1, 1);
  const lateLabels = await pngBytes(1, 1, BLUE);
  transport
    .script(url(BASE, target), respond.ok(await pngBytes(1, 1, RED)))
    .script(url(LABELS, target), async () => {
      await delay(250);
      return respond.ok(lateLabels);
    });

  const result = await source.imageForTile(target);

  assert.ok(result.kind === "image");
  assert.deepEqual(pixelAt(result.image, 0, 0), [...RED]);
});

test("a hidden source returns nothing and touches neither cache nor network", async () => {
  const { source, transport, seen } = setup({ hidden: true });
  const cache = new SpyCache(new MemoryTileCache());
  transport.script(url(TEMPLATE, tile(0, 0, 0)), respond.ok(await pngBytes(1, 1, RED)));

  assert.deepEqual(await source.imageForTile(tile(0, 0, 0), cache), { kind: "none" });
  assert.equal(await source.cachedImageForTile(tile(0, 0, 0), cache), null);
  assert.equal(cache.lookups, 0);
  assert.equal(cache.stores.length, 0);
  assert.equal(transport.calls.length, 0);
  await flushImmediates();
  assert.deepEqual(seen, []);

  source.setHidden(false);
  assert.equal((await source.imageForTile(tile(0, 0, 0), cache)).kind, "image");
});

test("a non-cacheable source never reads or writes the cache", async () => {
  const { source, transport } = setup({ cacheable: false });
  const cache = new SpyCache(new MemoryTileCache());
  transport.script(url(TEMPLATE, tile(0, 0, 1)), respond.ok(await pngBytes(1, 1, RED)));

  const result = await source.imageForTile(tile(0, 0, 1), cache);

  assert.equal(result.kind, "image");
  assert.equal(cache.lookups, 0);
  assert.equal(cache.stores.length, 0);
});

test("tiles outside the zoom range are reported as nonexistent", async () => {
  const { source, transport, seen } = setup({ maxZoom: 4 });

  assert.deepEqual(await source.imageForTile(tile(0, 0, 6)), { kind: "no_such_tile" });
  assert.equal(transport.calls.length, 0);
  await flushImmediates();
  assert.deepEqual(seen, []);
});

test("shared empty results cannot be altered by one caller", async () => {
  const { source } = setup({ maxZoom: 4 });

  const missing = await source.imageForTile(tile(0, 0, 6));
  assert.ok(Object.isFrozen(missing));
  assert.throws(() => Object.assign(missing, { kind: "image" }), TypeError);
  assert.deepEqual(await source.imageForTile(tile(0, 0, 6)), { kind: "no_such_tile" });
});

test("tiles are normalized before the URL is built", async () => {
  const { source, transport } = setup();
  transport.script(url(TEMPLATE, tile(3, 0, 2)), respond.ok(await pngBytes(1, 1, RED)));

  const result = await source.imageForTile(tile(-1, -2, 2));

  assert.equal(result.kind, "image");
  assert.equal(transport.calls[0].location, "https://tiles.example.test/2/3/0.png");
});

test("a resolver with no locations ends without a network call", async () => {
  class NothingHere extends WebTileSource {
    override urlsForTile(): string[] {
      return [];
    }
  }
  const transport = new ScriptedTransport();
  const source = new NothingHere({ cacheKey: "nothing", transport });

  assert.deepEqual(await source.imageForTile(tile(0, 0, 0)), { kind: "none" });
  assert.equal(transport.calls.length, 0);
});

test("a source that never says where tiles live fails loudly", async () => {
  class Unconfigured extends WebTileSource {}
  const source = new Unconfigured({ cacheKey: "unconfigured", transport: new ScriptedTransport() });

  await assert.rejects(source.imageForTile(tile(0, 0, 0)), TileSourceConfigError);
});

test("invalid construction options are configuration errors", () => {
  assert.throws(() => setup({ retryCount: 0 }), TileSourceConfigError);
  assert.throws(() => setup({ requestTimeoutSeconds: -1 }), TileSourceConfigError);
  assert.throws(() => setup({ requestTimeoutSeconds: 3_000_000 }), TileSourceConfigError);
  assert.throws(() => setup({ minZoom: 5, maxZoom: 2 }), TileSourceConfigError);
  assert.throws(() => new TemplateTileSource({ urlTemplate: "https://tiles.example.test/world.png" }), TileSourceConfigError);
});

test("cache-only lookup serves stored tiles without network or events", async () => {
  const { source, transport, seen } = setup();
  const cache = new MemoryTileCache();
  const stored = solidTileImage(1, 1, GREEN);
  await cache.addImage(tile(2, 2, 3), "streets", stored);

  assert.equal(await source.cachedImageForTile(tile(2, 2, 3), cache), stored);
  assert.equal(await source.cachedImageForTile(tile(0, 0, 3), cache), null);
  assert.equal(transport.calls.length, 0);
  await flushImmediates();
  assert.deepEqual(seen, []);
});

test("cache failures do not cost the caller its tile", async () => {
  const { source, transport } = setup();
  const broken: TileCache = {
    async cachedImage() {
      throw new Error("disk unavailable");
    },
    async addImage() {
      throw new Error("disk full");
    },
  };
  transport.script(url(TEMPLATE, tile(0, 0, 0)), respond.ok(await pngBytes(1, 1, RED)));

  const result = await source.imageForTile(tile(0, 0, 0), broken);

  assert.ok(result.kind === "image");
  assert.equal(result.origin, "network");
});

test("concurrent requests for different tiles do not interfere", async () => {
  const { source, transport } = setup();
  const cache = new MemoryTileCache();
  const tiles = [tile(0, 0, 1), tile(1, 0, 1), tile(0, 1, 1), tile(1, 1, 1)];
  const colors = [RED, GREEN, BLUE, RED] as const;
  for (const [i, t] of tiles.entries()) {
    transport.script(url(TEMPLATE, t), respond.timeout(), respond.ok(await pngBytes(1, 1, colors[i])));
  }

  const results = await Promise.all(tiles.map((t) => source.imageForTile(t, cache)));

  results.forEach((result, i) => {
    assert.ok(result.kind === "image");
    assert.deepEqual(pixelAt(result.image, 0, 0), [...colors[i]]);
  });
  assert.equal(cache.getStats().size, 4);
});
