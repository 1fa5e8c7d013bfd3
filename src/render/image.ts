import { readFile } from 'node:fs/promises';
import { resolvePlacement } from '../geometry/placement.js';
import { compositeRaster, decodeImage, fadeRaster, resizeRaster } from '../raster/codec.js';
import { cloneRaster } from '../raster/raster.js';
import { MissingOverlayAssetError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { ImageWatermarkSpec, PlacementRule, RasterImage, Size } from '../types.js';

export interface ImageRenderDeps {
  logger?: Logger;
  /** Overlay loader; defaults to reading and decoding `sourcePath` */
  loadOverlay?: (path: string) => Promise<RasterImage>;
}

async function loadFromDisk(path: string): Promise<RasterImage> {
  return decodeImage(await readFile(path));
}

/**
 * Overlay size after uniform scaling; never below one pixel
 */
export function scaledSize(size: Size, scalePercent: number): Size {
  const scale = scalePercent / 100;
  return {
    width: Math.max(1, Math.floor(size.width * scale)),
    height: Math.max(1, Math.floor(size.height * scale)),
  };
}

/**
 * Scale, fade and composite an overlay image onto a copy of `base`.
 *
 * A missing or unreadable overlay leaves the photo unwatermarked: `base`
 * is returned as-is.
 */
export async function renderImageWatermark(
  base: RasterImage,
  spec: ImageWatermarkSpec,
  placement: PlacementRule,
  deps: ImageRenderDeps = {},
): Promise<RasterImage> {
  const logger = deps.logger ?? silentLogger;

  let overlay: RasterImage;
  try {
    overlay = await (deps.loadOverlay ?? loadFromDisk)(spec.sourcePath);
  } catch (err) {
    logger.warn(new MissingOverlayAssetError(spec.sourcePath, describeError(err)).message);
    return base;
  }

  if (spec.opacityPercent <= 0) return cloneRaster(base);

  const resized = await resizeRaster(overlay, scaledSize(overlay, spec.scalePercent));
  const faded = await fadeRaster(resized, spec.opacityPercent);

  const at = resolvePlacement(placement, base, faded, {
    onFallback: reason => logger.warn(`custom position unusable (${reason}); using bottom-right`),
  });

  return compositeRaster(base, faded, at);
}
