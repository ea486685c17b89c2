import sharp from "sharp";
import { rawInput, TILE_CHANNELS, type TileImage } from "./codec";

function createTransparentCanvas(width: number, height: number): sharp.Sharp {
  return sharp({
    create: {
      width,
      height,
      channels: TILE_CHANNELS,
      background: { r: 0, g: 0, b: 0, alpha: 0 },
    },
  });
}

async function fitToCanvas(layer: TileImage, width: number, height: number): Promise<sharp.OverlayOptions> {
  if (layer.width <= width && layer.height <= height) {
    return { input: layer.data, raw: rawInput(layer), left: 0, top: 0 };
  }
  const cropWidth = Math.min(layer.width, width);
  const cropHeight = Math.min(layer.height, height);
  const cropped = await sharp(layer.data, { raw: rawInput(layer) })
    .extract({ left: 0, top: 0, width: cropWidth, height: cropHeight })
    .raw()
    .toBuffer();
  return {
    input: cropped,
    raw: { width: cropWidth, height: cropHeight, channels: TILE_CHANNELS },
    left: 0,
    top: 0,
  };
}

/**
 * Draws layers bottom to top at the origin of a canvas the size of the
 * first layer. Missing layers are skipped; a lone layer comes back as is.
 */
export async function compositeTileImages(images: ReadonlyArray<TileImage | null>): Promise<TileImage | null> {
  const layers = images.filter((image): image is TileImage => image !== null);
  if (layers.length === 0) return null;
  if (layers.length === 1) return layers[0];

  const { width, height } = layers[0];
  const overlays = await Promise.all(layers.map((layer) => fitToCanvas(layer, width, height)));
  const { data, info } = await createTransparentCanvas(width, height)
    .composite(overlays)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { width: info.width, height: info.height, data };
}
