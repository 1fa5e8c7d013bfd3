import { resolvePlacement } from '../geometry/placement.js';
import { percentToUnit } from '../geometry/math.js';
import { blendMaskInPlace, type Rgb } from '../raster/composite.js';
import { toChannels, withAlpha } from '../raster/raster.js';
import { BLACK, WHITE, parseColor } from '../text/color.js';
import { DEFAULT_FONT_PROVIDERS, resolveFont, type FontProvider } from '../text/fonts.js';
import { canvasRasterizer, type GlyphRasterizer } from '../text/rasterizer.js';
import { describeError } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { PlacementRule, RasterImage, TextWatermarkSpec } from '../types.js';

export interface TextRenderDeps {
  rasterizer?: GlyphRasterizer;
  fontProviders?: readonly FontProvider[];
  logger?: Logger;
}

/** Shadow alpha at full opacity */
const SHADOW_ALPHA = 160;

/**
 * Shadow offset in pixels for a font size
 */
export function shadowOffset(fontSizePx: number): number {
  return Math.max(1, Math.floor(fontSizePx / 24));
}

function resolveColor(value: string, logger: Logger): Rgb {
  try {
    return parseColor(value);
  } catch (err) {
    logger.warn(`${describeError(err)}, defaulting to white`);
    return WHITE;
  }
}

/**
 * Draw a text watermark (with optional drop shadow) onto a copy of `base`.
 * The result has the same channel count as `base`.
 */
export function renderTextWatermark(
  base: RasterImage,
  spec: TextWatermarkSpec,
  placement: PlacementRule,
  deps: TextRenderDeps = {},
): RasterImage {
  const logger = deps.logger ?? silentLogger;
  const rasterizer = deps.rasterizer ?? canvasRasterizer;

  const canvas = withAlpha(base);
  const font = resolveFont(
    { family: spec.fontFamily, ...(spec.fontPath !== undefined && { path: spec.fontPath }) },
    deps.fontProviders ?? DEFAULT_FONT_PROVIDERS,
    logger,
  );
  logger.debug(`text watermark font: ${font.family} (${font.source})`);

  const mask = rasterizer.rasterize(spec.content, font, {
    sizePx: spec.fontSizePx,
    bold: spec.bold,
    italic: spec.italic,
  });

  const at = resolvePlacement(placement, canvas, mask, {
    onFallback: reason => logger.warn(`custom position unusable (${reason}); using bottom-right`),
  });

  const opacity = percentToUnit(spec.opacityPercent);

  if (spec.shadowEnabled) {
    const s = shadowOffset(spec.fontSizePx);
    blendMaskInPlace(canvas, mask, { x: at.x + s, y: at.y + s }, BLACK, Math.floor(SHADOW_ALPHA * opacity));
  }
  blendMaskInPlace(canvas, mask, at, resolveColor(spec.color, logger), Math.floor(255 * opacity));

  return toChannels(canvas, base.channels);
}
