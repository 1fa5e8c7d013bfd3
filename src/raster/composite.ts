/**
 * Source-over painting of glyph coverage masks on straight-alpha 8-bit
 * rasters. Image overlays are composited by sharp (see `codec.ts`).
 */

import type { Point, RasterImage } from '../types.js';

/**
 * 8-bit coverage mask, e.g. rasterized glyphs
 */
export interface CoverageMask {
  readonly width: number;
  readonly height: number;
  /** One byte per pixel, 0 = transparent, 255 = fully covered */
  readonly coverage: Uint8Array;
}

export type Rgb = readonly [number, number, number];

/**
 * Blend one source pixel of alpha `sa` (0..255) into `target` at byte index `i`.
 */
function blendPixel(target: RasterImage, i: number, r: number, g: number, b: number, sa: number): void {
  if (sa <= 0) return;
  const d = target.data;

  if (target.channels === 3 || d[i + 3] === 255) {
    if (sa >= 255) {
      d[i] = r;
      d[i + 1] = g;
      d[i + 2] = b;
      return;
    }
    const inv = 255 - sa;
    d[i] = Math.round((r * sa + d[i]! * inv) / 255);
    d[i + 1] = Math.round((g * sa + d[i + 1]! * inv) / 255);
    d[i + 2] = Math.round((b * sa + d[i + 2]! * inv) / 255);
    return;
  }

  const srcA = sa / 255;
  const dstA = d[i + 3]! / 255;
  const outA = srcA + dstA * (1 - srcA);
  const dstW = dstA * (1 - srcA);
  d[i] = Math.round((r * srcA + d[i]! * dstW) / outA);
  d[i + 1] = Math.round((g * srcA + d[i + 1]! * dstW) / outA);
  d[i + 2] = Math.round((b * srcA + d[i + 2]! * dstW) / outA);
  d[i + 3] = Math.round(outA * 255);
}

/**
 * Clip a `w`×`h` box placed at `at` against the target bounds.
 * Returns the visible range in source coordinates, or null when nothing
 * overlaps.
 */
function clipBox(target: RasterImage, at: Point, w: number, h: number) {
  const x0 = Math.max(0, -at.x);
  const y0 = Math.max(0, -at.y);
  const x1 = Math.min(w, target.width - at.x);
  const y1 = Math.min(h, target.height - at.y);
  return x0 < x1 && y0 < y1 ? { x0, y0, x1, y1 } : null;
}

/**
 * Paint a solid colour through a coverage mask onto `target` in place.
 * `alpha` (0..255) scales the mask's coverage.
 */
export function blendMaskInPlace(
  target: RasterImage,
  mask: CoverageMask,
  at: Point,
  color: Rgb,
  alpha: number,
): void {
  if (alpha <= 0) return;
  const box = clipBox(target, at, mask.width, mask.height);
  if (!box) return;

  const [r, g, b] = color;
  for (let my = box.y0; my < box.y1; my++) {
    for (let mx = box.x0; mx < box.x1; mx++) {
      const coverage = mask.coverage[my * mask.width + mx]!;
      if (coverage === 0) continue;
      const t = ((at.y + my) * target.width + at.x + mx) * target.channels;
      blendPixel(target, t, r, g, b, Math.round((coverage * alpha) / 255));
    }
  }
}

