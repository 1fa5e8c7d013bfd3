import { renderImageWatermark, type ImageRenderDeps } from './image.js';
import { renderTextWatermark, type TextRenderDeps } from './text.js';
import type { PlacementRule, RasterImage, WatermarkSpec } from '../types.js';

export type RenderDeps = TextRenderDeps & ImageRenderDeps;

/**
 * Apply whichever watermark `spec` describes.
 */
export async function renderWatermark(
  base: RasterImage,
  spec: WatermarkSpec,
  placement: PlacementRule,
  deps: RenderDeps = {},
): Promise<RasterImage> {
  switch (spec.kind) {
    case 'text':
      return renderTextWatermark(base, spec, placement, deps);
    case 'image':
      return renderImageWatermark(base, spec, placement, deps);
  }
}

export { renderTextWatermark, shadowOffset } from './text.js';
export { renderImageWatermark, scaledSize } from './image.js';
export type { TextRenderDeps } from './text.js';
export type { ImageRenderDeps } from './image.js';
