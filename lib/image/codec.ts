import sharp from "sharp";

export const TILE_CHANNELS = 4;

/** Decoded tile pixels: 8-bit RGBA, row-major, no padding. */
export type TileImage = {
  width: number;
  height: number;
  data: Buffer;
};

export function rawInput(image: TileImage) {
  return { width: image.width, height: image.height, channels: TILE_CHANNELS } as const;
}

export async function decodeTileImage(bytes: Buffer): Promise<TileImage> {
  const { data, info } = await sharp(bytes).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== TILE_CHANNELS) {
    throw new Error(`Decoded tile has ${info.channels} channels, expected ${TILE_CHANNELS}`);
  }
  return { width: info.width, height: info.height, data };
}

export async function encodeTileImage(image: TileImage): Promise<Buffer> {
  return sharp(image.data, { raw: rawInput(image) }).png().toBuffer();
}

export function solidTileImage(
  width: number,
  height: number,
  rgba: readonly [number, number, number, number],
): TileImage {
  const data = Buffer.alloc(width * height * TILE_CHANNELS);
  for (let i = 0; i < data.length; i += TILE_CHANNELS) {
    data[i] = rgba[0];
    data[i + 1] = rgba[1];
    data[i + 2] = rgba[2];
    data[i + 3] = rgba[3];
  }
  return { width, height, data };
}
