import { createCanvas } from '@napi-rs/canvas';
import { fontShorthand, type FontHandle } from './fonts.js';
import type { CoverageMask } from '../raster/composite.js';

export interface GlyphStyle {
  sizePx: number;
  bold: boolean;
  italic: boolean;
}

/**
 * Turns a string into a coverage mask cropped to its ink bounding box.
 */
export interface GlyphRasterizer {
  rasterize(text: string, font: FontHandle, style: GlyphStyle): CoverageMask;
}

const EMPTY_MASK: CoverageMask = { width: 0, height: 0, coverage: new Uint8Array(0) };

/**
 * Skia-backed rasterizer (@napi-rs/canvas). Glyphs are drawn white on a
 * transparent canvas and the alpha channel is kept as coverage.
 */
export const canvasRasterizer: GlyphRasterizer = {
  rasterize(text, font, style) {
    const shorthand = fontShorthand(font, style.sizePx, style.bold, style.italic);

    const probe = createCanvas(1, 1).getContext('2d');
    probe.font = shorthand;
    const m = probe.measureText(text);
    const left = Math.ceil(m.actualBoundingBoxLeft);
    const ascent = Math.ceil(m.actualBoundingBoxAscent);
    const width = left + Math.ceil(m.actualBoundingBoxRight);
    const height = ascent + Math.ceil(m.actualBoundingBoxDescent);
    if (!(width > 0) || !(height > 0)) return EMPTY_MASK;

    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    ctx.font = shorthand;
    ctx.textBaseline = 'alphabetic';
    ctx.fillStyle = '#ffffff';
    ctx.fillText(text, left, ascent);

    const rgba = ctx.getImageData(0, 0, width, height).data;
    const coverage = new Uint8Array(width * height);
    for (let i = 0; i < coverage.length; i++) coverage[i] = rgba[i * 4 + 3]!;
    return { width, height, coverage };
  },
};
