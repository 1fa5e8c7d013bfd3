import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import type { CoverageMask } from '../../src/raster/composite.js';
import type { GlyphRasterizer } from '../../src/text/rasterizer.js';
import type { RasterImage } from '../../src/types.js';

export async function makeTempDir(prefix = 'photomark-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

type Rgb = { r: number; g: number; b: number };

/**
 * Solid-colour image encoded by sharp
 */
export async function solidImage(
  width: number,
  height: number,
  format: 'jpeg' | 'png' | 'webp' | 'tiff',
  color: Rgb = { r: 40, g: 80, b: 120 },
): Promise<Buffer> {
  const base = sharp({ create: { width, height, channels: 3, background: color } });
  switch (format) {
    case 'jpeg': return base.jpeg({ quality: 95 }).toBuffer();
    case 'png':  return base.png().toBuffer();
    case 'webp': return base.webp({ lossless: true }).toBuffer();
    case 'tiff': return base.tiff().toBuffer();
  }
}

/**
 * Solid RGBA PNG, used as an overlay
 */
export async function solidRgbaPng(width: number, height: number, rgba: [number, number, number, number]): Promise<Buffer> {
  const [r, g, b, a] = rgba;
  return sharp({ create: { width, height, channels: 4, background: { r, g, b, alpha: a / 255 } } })
    .png()
    .toBuffer();
}

/**
 * Uncompressed 24-bit BMP, bottom-up unless `topDown`.
 */
export function buildBmp24(image: RasterImage, topDown = false): Uint8Array {
  const { width, height } = image;
  const stride = Math.ceil((24 * width) / 32) * 4;
  const pixelOffset = 14 + 40;
  const out = new Uint8Array(pixelOffset + stride * height);
  const view = new DataView(out.buffer);

  out.set([0x42, 0x4d], 0);
  view.setUint32(2, out.length, true);
  view.setUint32(10, pixelOffset, true);
  view.setUint32(14, 40, true);
  view.setInt32(18, width, true);
  view.setInt32(22, topDown ? -height : height, true);
  view.setUint16(26, 1, true);
  view.setUint16(28, 24, true);
  view.setUint32(30, 0, true);
  view.setUint32(34, stride * height, true);

  for (let y = 0; y < height; y++) {
    const row = topDown ? y : height - 1 - y;
    for (let x = 0; x < width; x++) {
      const s = (y * width + x) * image.channels;
      const d = pixelOffset + row * stride + x * 3;
      out[d] = image.data[s + 2]!;
      out[d + 1] = image.data[s + 1]!;
      out[d + 2] = image.data[s]!;
    }
  }
  return out;
}

/**
 * Rasterizer stand-in: every string becomes a fully covered box
 */
export function boxRasterizer(width: number, height: number): GlyphRasterizer & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    rasterize(text) {
      calls.push(text);
      const mask: CoverageMask = { width, height, coverage: new Uint8Array(width * height).fill(255) };
      return mask;
    },
  };
}

/**
 * Pixel components at (x, y), RGB or RGBA
 */
export function pixelAt(image: RasterImage, x: number, y: number): number[] {
  const i = (y * image.width + x) * image.channels;
  return Array.from(image.data.subarray(i, i + image.channels));
}
