import assert from "node:assert/strict";
import test from "node:test";
import { TileSourceConfigError } from "../config";
import { solidTileImage } from "../image/codec";
import { DefaultImageRegistry } from "./defaultImages";

test("registered images are looked up by zoom", () => {
  const registry = new DefaultImageRegistry();
  const sea = solidTileImage(1, 1, [0, 0, 128, 255]);
  registry.register(3, sea);

  assert.equal(registry.lookup(3), sea);
  assert.equal(registry.lookup(4), null);
});

test("registering again replaces the image for that zoom", () => {
  const registry = new DefaultImageRegistry();
  const first = solidTileImage(1, 1, [0, 0, 0, 255]);
  const second = solidTileImage(1, 1, [255, 255, 255, 255]);
  registry.register(0, first);
  registry.register(0, second);
  registry.register(2, first);

  assert.equal(registry.lookup(0), second);
  assert.deepEqual(registry.zooms(), [0, 2]);
});

test("negative or fractional zoom levels are rejected", () => {
  const registry = new DefaultImageRegistry();
  const image = solidTileImage(1, 1, [0, 0, 0, 255]);
  assert.throws(() => registry.register(-1, image), TileSourceConfigError);
  assert.throws(() => registry.register(1.5, image), TileSourceConfigError);
});
