import type { RasterImage } from '../types.js';

/**
 * Allocate a raster filled with one colour (RGB or RGBA components).
 */
export function createRaster(
  width: number,
  height: number,
  channels: 3 | 4,
  fill: readonly number[] = [0, 0, 0, 255],
): RasterImage {
  const data = new Uint8Array(width * height * channels);
  for (let i = 0; i < data.length; i += channels) {
    for (let c = 0; c < channels; c++) data[i + c] = fill[c] ?? 255;
  }
  return { width, height, channels, data };
}

export function cloneRaster(image: RasterImage): RasterImage {
  return { ...image, data: new Uint8Array(image.data) };
}

/**
 * Return an RGBA copy (new buffer even when the input already has alpha).
 */
export function withAlpha(image: RasterImage): RasterImage {
  if (image.channels === 4) return cloneRaster(image);

  const { width, height, data } = image;
  const out = new Uint8Array(width * height * 4);
  for (let s = 0, d = 0; s < data.length; s += 3, d += 4) {
    out[d] = data[s]!;
    out[d + 1] = data[s + 1]!;
    out[d + 2] = data[s + 2]!;
    out[d + 3] = 255;
  }
  return { width, height, channels: 4, data: out };
}

/**
 * Drop the alpha channel. Only meaningful for rasters known to be opaque.
 */
export function withoutAlpha(image: RasterImage): RasterImage {
  if (image.channels === 3) return image;

  const { width, height, data } = image;
  const out = new Uint8Array(width * height * 3);
  for (let s = 0, d = 0; s < data.length; s += 4, d += 3) {
    out[d] = data[s]!;
    out[d + 1] = data[s + 1]!;
    out[d + 2] = data[s + 2]!;
  }
  return { width, height, channels: 3, data: out };
}

/**
 * Convert to the requested channel count
 */
export function toChannels(image: RasterImage, channels: 3 | 4): RasterImage {
  return channels === 4 ? (image.channels === 4 ? image : withAlpha(image)) : withoutAlpha(image);
}

