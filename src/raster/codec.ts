/**
 * Decode/encode between file bytes and RasterImage.
 *
 * JPEG, PNG, TIFF and WebP go through sharp (libvips). BMP is not among
 * the formats libvips loads, so it is decoded by `formats/bmp`.
 */

import sharp from 'sharp';
import { detectFormat } from '../detect.js';
import { bmp } from '../formats/bmp.js';
import { percentToUnit } from '../geometry/math.js';
import { cloneRaster, toChannels } from './raster.js';
import { DecodeError, EncodeError, describeError } from '../errors.js';
import type { OutputFormat, Point, RasterImage, Size } from '../types.js';

export type EncodeFormat = OutputFormat | 'tiff' | 'webp';

export interface EncodeOptions {
  format: EncodeFormat;
  /** 0..100; JPEG and WebP only. Default 95 */
  quality?: number;
  /** JPEG chroma subsampling. Default '4:2:0' */
  chromaSubsampling?: '4:4:4' | '4:2:0';
  /** Background used when alpha has to be dropped for JPEG. Default white */
  background?: string;
}

function toRaster(data: Buffer, info: sharp.OutputInfo): RasterImage {
  if (info.channels !== 3 && info.channels !== 4) {
    throw new DecodeError(`unexpected ${info.channels}-channel output`);
  }
  return { width: info.width, height: info.height, channels: info.channels, data };
}

/**
 * Wrap a raster as a sharp pipeline input
 */
export function rasterInput(image: RasterImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

/**
 * Decode encoded image bytes into 8-bit sRGB pixels (3 or 4 channels).
 *
 * @throws DecodeError for unrecognised, truncated or corrupt data
 */
export async function decodeImage(data: Uint8Array): Promise<RasterImage> {
  const format = detectFormat(data);

  if (format === 'unknown') {
    throw new DecodeError('unrecognised image format');
  }

  if (format === 'bmp') {
    try {
      return bmp.decode(data);
    } catch (err) {
      throw new DecodeError(describeError(err));
    }
  }

  try {
    const { data: pixels, info } = await sharp(data)
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
    return toRaster(pixels, info);
  } catch (err) {
    if (err instanceof DecodeError) throw err;
    throw new DecodeError(describeError(err));
  }
}

/**
 * Resample to an exact size with a Lanczos kernel
 */
export async function resizeRaster(image: RasterImage, size: Size): Promise<RasterImage> {
  if (size.width === image.width && size.height === image.height) return image;
  const { data, info } = await rasterInput(image)
    .resize(size.width, size.height, { fit: 'fill', kernel: 'lanczos3' })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return toRaster(data, info);
}

/**
 * Scale every alpha sample by `opacityPercent / 100`, masking with a
 * translucent tile. The result is RGBA.
 */
export async function fadeRaster(image: RasterImage, opacityPercent: number): Promise<RasterImage> {
  const alpha = Math.round(percentToUnit(opacityPercent) * 255);
  const { data, info } = await rasterInput(image)
    .ensureAlpha()
    .composite([{
      input: Buffer.from([255, 255, 255, alpha]),
      raw: { width: 1, height: 1, channels: 4 },
      tile: true,
      blend: 'dest-in',
    }])
    .raw()
    .toBuffer({ resolveWithObject: true });
  return toRaster(data, info);
}

/**
 * Composite an RGBA overlay onto a copy of `base` with its top-left corner
 * at `at`. The part hanging off the base is cut away first, since libvips
 * only places overlays that fit. The result keeps `base`'s channel count.
 */
export async function compositeRaster(base: RasterImage, overlay: RasterImage, at: Point): Promise<RasterImage> {
  const left = Math.max(0, at.x);
  const top = Math.max(0, at.y);
  const cropLeft = left - at.x;
  const cropTop = top - at.y;
  const width = Math.min(overlay.width - cropLeft, base.width - left);
  const height = Math.min(overlay.height - cropTop, base.height - top);
  if (width <= 0 || height <= 0) return cloneRaster(base);

  let visible = rasterInput(overlay).ensureAlpha();
  if (width !== overlay.width || height !== overlay.height) {
    visible = visible.extract({ left: cropLeft, top: cropTop, width, height });
  }
  const input = await visible.raw().toBuffer();

  const { data, info } = await rasterInput(base)
    .composite([{ input, raw: { width, height, channels: 4 }, top, left, blend: 'over' }])
    .raw()
    .toBuffer({ resolveWithObject: true });
  return toChannels(toRaster(data, info), base.channels);
}

/**
 * Encode pixels. JPEG has no alpha channel, so RGBA input is flattened
 * onto `background` first.
 *
 * @throws EncodeError
 */
export async function encodeImage(image: RasterImage, options: EncodeOptions): Promise<Buffer> {
  const quality = Math.min(100, Math.max(1, Math.round(options.quality ?? 95)));
  let pipeline = rasterInput(image);

  try {
    switch (options.format) {
      case 'jpeg':
        if (image.channels === 4) {
          pipeline = pipeline.flatten({ background: options.background ?? '#ffffff' });
        }
        pipeline = pipeline.jpeg({
          quality,
          chromaSubsampling: options.chromaSubsampling ?? '4:2:0',
        });
        break;
      case 'png':
        pipeline = pipeline.png();
        break;
      case 'webp':
        pipeline = pipeline.webp({ quality });
        break;
      case 'tiff':
        pipeline = pipeline.tiff();
        break;
    }
    return await pipeline.toBuffer();
  } catch (err) {
    throw new EncodeError(describeError(err));
  }
}
