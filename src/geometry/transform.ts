import { InvalidTransformError } from '../errors.js';
import type { Point, Size } from '../types.js';

/**
 * Map a point picked on a scaled preview canvas into full-resolution pixel
 * space. Each axis scales independently; results are rounded to the nearest
 * pixel.
 *
 * @throws InvalidTransformError when the preview canvas has no area
 */
export function toFullRes(point: Point, previewCanvasSize: Size, fullSize: Size): Point {
  const { width: pw, height: ph } = previewCanvasSize;
  if (!(pw > 0) || !(ph > 0) || !Number.isFinite(pw) || !Number.isFinite(ph)) {
    throw new InvalidTransformError(pw, ph);
  }

  const scaleX = fullSize.width / pw;
  const scaleY = fullSize.height / ph;
  return {
    x: Math.round(point.x * scaleX),
    y: Math.round(point.y * scaleY),
  };
}
