import { resizeRaster } from '../raster/codec.js';
import { renderWatermark, type RenderDeps } from '../render/index.js';
import type { CustomPlacement, PlacementRule, Point, RasterImage, Size, WatermarkSpec } from '../types.js';

/**
 * Largest size with the image's aspect ratio that fits in `box`.
 * Images already inside the box keep their size.
 */
export function fitPreviewSize(image: Size, box: Size): Size {
  const scale = Math.min(1, box.width / image.width, box.height / image.height);
  return {
    width: Math.max(1, Math.floor(image.width * scale)),
    height: Math.max(1, Math.floor(image.height * scale)),
  };
}

/**
 * Record a point picked on a preview together with the canvas size it was
 * picked on.
 */
export function customPlacementFromPreview(point: Point, canvas: Size, marginPx?: number): CustomPlacement {
  return {
    kind: 'custom',
    previewX: point.x,
    previewY: point.y,
    previewCanvasWidth: canvas.width,
    previewCanvasHeight: canvas.height,
    ...(marginPx !== undefined && { marginPx }),
  };
}

export interface PreviewResult {
  image: RasterImage;
  /** Canvas size to store with custom placements picked on this preview */
  canvasSize: Size;
}

/**
 * Render the watermark at full resolution, then downsample to fit `box`.
 * The preview therefore shows exactly what an export produces.
 */
export async function renderPreview(
  base: RasterImage,
  spec: WatermarkSpec,
  placement: PlacementRule,
  box: Size,
  deps: RenderDeps = {},
): Promise<PreviewResult> {
  const full = await renderWatermark(base, spec, placement, deps);
  const canvasSize = fitPreviewSize(full, box);
  return { image: await resizeRaster(full, canvasSize), canvasSize };
}
