import sharp from 'sharp';
import { LightnessImage } from './LightnessImage.js';

/**
 * Decode a PNG/JPEG screenshot and derive the HLS lightness channel,
 * L = (max(R,G,B) + min(R,G,B)) / 2.
 */
export async function decodeLightness(input: Buffer | string): Promise<LightnessImage> {
  const { data, info } = await sharp(input)
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  const { width, height, channels } = info;
  const out = new Uint8Array(width * height);
  for (let i = 0, p = 0; i < out.length; i++, p += channels) {
    if (channels < 3) {
      out[i] = data[p];
      continue;
    }
    const r = data[p];
    const g = data[p + 1];
    const b = data[p + 2];
    out[i] = Math.round((Math.max(r, g, b) + Math.min(r, g, b)) / 2);
  }
  return new LightnessImage(width, height, out);
}

/** Encode a lightness raster as PNG for the text recognizer. */
export async function encodePng(image: LightnessImage): Promise<Buffer> {
  return sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 },
  })
    .png()
    .toBuffer();
}
