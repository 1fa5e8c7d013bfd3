import { toFullRes } from './transform.js';
import { clamp } from './math.js';
import { describeError } from '../errors.js';
import type { Anchor, CustomPlacement, PlacementRule, Point, Size } from '../types.js';

/** Margin used when a custom rule falls back without one of its own */
export const DEFAULT_MARGIN_PX = 12;

export interface ResolveOptions {
  /**
   * Called when a custom rule cannot be honoured and the bottom-right
   * preset is used instead.
   */
  onFallback?: (reason: string) => void;
}

/**
 * Top-left corner of a `watermark`-sized box anchored inside `image`.
 */
export function anchorPosition(anchor: Anchor, image: Size, watermark: Size, margin: number): Point {
  const { width: W, height: H } = image;
  const { width: w, height: h } = watermark;

  switch (anchor) {
    case 'top-left':     return { x: margin, y: margin };
    case 'top-right':    return { x: W - w - margin, y: margin };
    case 'bottom-left':  return { x: margin, y: H - h - margin };
    case 'bottom-right': return { x: W - w - margin, y: H - h - margin };
    case 'center':       return { x: Math.floor((W - w) / 2), y: Math.floor((H - h) / 2) };
  }
}

function resolveCustom(rule: CustomPlacement, image: Size, watermark: Size): Point {
  const full = toFullRes(
    { x: rule.previewX, y: rule.previewY },
    { width: rule.previewCanvasWidth, height: rule.previewCanvasHeight },
    image,
  );
  if (!Number.isFinite(full.x) || !Number.isFinite(full.y)) {
    throw new RangeError(`preview point (${rule.previewX}, ${rule.previewY}) is not finite`);
  }

  // Keep the watermark inside the image; an oversize watermark pins to 0
  return {
    x: clamp(full.x, 0, Math.max(0, image.width - watermark.width)),
    y: clamp(full.y, 0, Math.max(0, image.height - watermark.height)),
  };
}

/**
 * Turn a placement rule into the watermark's top-left pixel on the
 * full-resolution image.
 *
 * A custom rule whose preview canvas is unusable resolves as the
 * bottom-right preset instead of failing, so templates saved against an
 * old preview keep exporting.
 */
export function resolvePlacement(
  rule: PlacementRule,
  image: Size,
  watermark: Size,
  options: ResolveOptions = {},
): Point {
  if (rule.kind === 'preset') {
    return anchorPosition(rule.anchor, image, watermark, rule.marginPx);
  }

  try {
    return resolveCustom(rule, image, watermark);
  } catch (err) {
    options.onFallback?.(describeError(err));
    return anchorPosition('bottom-right', image, watermark, rule.marginPx ?? DEFAULT_MARGIN_PX);
  }
}
